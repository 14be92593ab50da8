import * as pulumi from "@pulumi/pulumi";
import { loadSettings } from "./src/config";
import { createDocumentPipeline } from "./src/pipeline";

// Import the program's configuration settings.
const config = new pulumi.Config();
const settings = loadSettings(config);

const pipeline = createDocumentPipeline(settings);

export const resourceGroupName = pipeline.resourceGroupName;
export const storageAccountName = pipeline.storageAccountName;
export const hostingPlanId = pipeline.hostingPlanId;
export const hostingPlanName = pipeline.hostingPlanName;
export const hostingPlanLocation = pipeline.hostingPlanLocation;
export const hostingPlanSkuName = pipeline.hostingPlanSkuName;
export const functionAppId = pipeline.functionAppId;
export const functionAppName = pipeline.functionAppName;
export const functionAppUrl = pipeline.functionAppUrl;
export const identityPrincipalId = pipeline.identityPrincipalId;
export const workerRuntime = pipeline.workerRuntime;
export const eventGridTopicName = pipeline.eventGridTopicName;
