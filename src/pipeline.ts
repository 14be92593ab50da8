import * as pulumi from "@pulumi/pulumi";
import * as applicationinsights from "@pulumi/azure-native/applicationinsights";
import * as authorization from "@pulumi/azure-native/authorization";
import * as eventgrid from "@pulumi/azure-native/eventgrid";
import * as managedidentity from "@pulumi/azure-native/managedidentity";
import * as network from "@pulumi/azure-native/network";
import * as operationalinsights from "@pulumi/azure-native/operationalinsights";
import * as resources from "@pulumi/azure-native/resources";
import * as storage from "@pulumi/azure-native/storage";
import * as web from "@pulumi/azure-native/web";
import type { StackSettings } from "./config";
import {
    deploymentContainerName,
    isFlexConsumption,
    isFlexFunctionApp,
    missingReference,
    resolveFunctionApp,
    resolveHostingPlan,
    workerRuntimeOf,
} from "./hosting";
import type { FunctionAppConfig, FunctionAppDeploymentConfig, ManagedIdentityConfig } from "./hosting";

// Event Grid-triggered starter deployed with the function code.
export const orchestratorFunctionName = "start_orchestrator_on_blob";

const storageBlobDataOwnerRoleId = "b7e6dc6d-f1e8-4753-8033-0f276bb0955b";

export interface DocumentPipeline {
    resourceGroupName: pulumi.Output<string>;
    storageAccountName: pulumi.Output<string>;
    hostingPlanId: pulumi.Output<string>;
    hostingPlanName: pulumi.Output<string>;
    hostingPlanLocation: pulumi.Output<string>;
    hostingPlanSkuName: string;
    functionAppId: pulumi.Output<string>;
    functionAppName: pulumi.Output<string>;
    functionAppUrl: pulumi.Output<string>;
    identityPrincipalId: pulumi.Output<string>;
    workerRuntime: string;
    eventGridTopicName: pulumi.Output<string>;
    eventSubscriptionId: pulumi.Output<string>;
}

function identityOf(app: FunctionAppConfig): ManagedIdentityConfig {
    if (app.identity === undefined) {
        throw missingReference("identityId", "to attach the Function App identity");
    }
    return app.identity;
}

function subnetOf(app: FunctionAppConfig): string {
    if (app.virtualNetworkSubnetId === undefined) {
        throw missingReference("subnetId", "when network isolation is enabled");
    }
    return app.virtualNetworkSubnetId;
}

function deploymentOf(app: FunctionAppConfig): FunctionAppDeploymentConfig {
    if (!isFlexFunctionApp(app)) {
        throw missingReference("functionAppConfig", "on a Flex Consumption plan");
    }
    return app.functionAppConfig;
}

export function createDocumentPipeline(settings: StackSettings): DocumentPipeline {
    const flex = isFlexConsumption(settings.skuTier);
    const location = settings.location;

    // Resolved before anything is registered so an invalid SKU aborts the whole run.
    const planConfig = resolveHostingPlan({
        kind: "FunctionApp",
        name: settings.planName,
        skuTier: settings.skuTier,
        skuName: settings.skuName,
        zoneRedundant: settings.zoneRedundant,
        location,
    });

    void pulumi.log.info(
        `Hosting ${settings.appName} on ${planConfig.sku.tier}/${planConfig.sku.name} ` +
        `(${flex ? "Flex Consumption" : "classic"} configuration)`,
    );
    if (settings.zoneRedundant && !flex) {
        void pulumi.log.warn(`zoneRedundant is ignored for the ${settings.skuTier} tier`);
    }

    const resourceGroup = new resources.ResourceGroup("resource-group", {
        resourceGroupName: settings.resourceGroupName,
        location,
    });

    const account = new storage.StorageAccount("storage", {
        resourceGroupName: resourceGroup.name,
        location,
        kind: storage.Kind.StorageV2,
        sku: {
            name: storage.SkuName.Standard_LRS,
        },
        minimumTlsVersion: storage.MinimumTlsVersion.TLS1_2,
        allowBlobPublicAccess: false,
        allowSharedKeyAccess: false,
        enableHttpsTrafficOnly: true,
    });

    const containers = [deploymentContainerName, settings.inputContainer, settings.outputContainer].map(name =>
        new storage.BlobContainer(`${name}-container`, {
            resourceGroupName: resourceGroup.name,
            accountName: account.name,
            containerName: name,
            publicAccess: storage.PublicAccess.None,
        }));

    const identity = new managedidentity.UserAssignedIdentity("identity", {
        resourceGroupName: resourceGroup.name,
        location,
    });

    const clientConfig = authorization.getClientConfigOutput();
    const blobOwnerAssignment = new authorization.RoleAssignment("identity-blob-owner", {
        principalId: identity.principalId,
        principalType: authorization.PrincipalType.ServicePrincipal,
        roleDefinitionId: pulumi.interpolate`/subscriptions/${clientConfig.subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${storageBlobDataOwnerRoleId}`,
        scope: account.id,
    });

    const workspace = new operationalinsights.Workspace("logs", {
        resourceGroupName: resourceGroup.name,
        location,
        sku: {
            name: operationalinsights.WorkspaceSkuNameEnum.PerGB2018,
        },
        retentionInDays: settings.logRetentionDays,
    });

    const appInsights = new applicationinsights.Component("app-insights", {
        resourceGroupName: resourceGroup.name,
        location,
        applicationType: applicationinsights.ApplicationType.Web,
        kind: "web",
        workspaceResourceId: workspace.id,
        ingestionMode: applicationinsights.IngestionMode.LogAnalytics,
    });

    let subnetId: pulumi.Output<string | undefined> = pulumi.output<string | undefined>(undefined);
    if (settings.networkIsolation) {
        const vnet = new network.VirtualNetwork("vnet", {
            resourceGroupName: resourceGroup.name,
            location,
            addressSpace: {
                addressPrefixes: [settings.vnetAddressPrefix],
            },
        });
        const subnet = new network.Subnet("function-subnet", {
            resourceGroupName: resourceGroup.name,
            virtualNetworkName: vnet.name,
            addressPrefix: settings.subnetAddressPrefix,
            serviceEndpoints: [{ service: "Microsoft.Storage" }],
            delegations: [{
                name: "delegation",
                serviceName: flex ? "Microsoft.App/environments" : "Microsoft.Web/serverFarms",
            }],
        });
        subnetId = subnet.id;
    }

    const plan = new web.AppServicePlan("plan", {
        resourceGroupName: resourceGroup.name,
        ...planConfig,
    });

    const appConfig = pulumi
        .all([plan.id, identity.id, identity.clientId, account.name, appInsights.instrumentationKey, subnetId])
        .apply(([planId, identityId, clientId, storageName, instrumentationKey, subnet]) =>
            resolveFunctionApp({
                name: settings.appName,
                location,
                runtime: settings.runtime,
                appPurpose: settings.appPurpose,
                appSettingsBase: settings.appSettings,
                networkIsolation: settings.networkIsolation,
                subnetId: subnet,
                maximumInstanceCount: settings.maximumInstanceCount,
                instanceMemoryMB: settings.instanceMemoryMB,
                identity: { resourceId: identityId, clientId },
                funcStorageName: storageName,
                storageSuffix: settings.storageSuffix,
                appInsightsInstrumentationKey: instrumentationKey,
                appConfigName: settings.appConfigName,
            }, { id: planId, skuTier: settings.skuTier }));

    const functionApp = new web.WebApp("function-app", {
        resourceGroupName: resourceGroup.name,
        name: appConfig.apply(app => app.name),
        location: appConfig.apply(app => app.location),
        kind: appConfig.apply(app => app.kind),
        httpsOnly: appConfig.apply(app => app.httpsOnly),
        serverFarmId: appConfig.apply(app => app.serverFarmId),
        identity: appConfig.apply(identityOf),
        virtualNetworkSubnetId: settings.networkIsolation ? appConfig.apply(subnetOf) : undefined,
        siteConfig: appConfig.apply(app => app.siteConfig),
        functionAppConfig: flex ? appConfig.apply(deploymentOf) : undefined,
    }, { dependsOn: [blobOwnerAssignment, ...containers] });

    const topic = new eventgrid.SystemTopic("storage-events", {
        resourceGroupName: resourceGroup.name,
        location,
        source: account.id,
        topicType: "Microsoft.Storage.StorageAccounts",
    });

    const subscription = new eventgrid.SystemTopicEventSubscription("blob-created", {
        resourceGroupName: resourceGroup.name,
        systemTopicName: topic.name,
        destination: {
            endpointType: "AzureFunction",
            resourceId: pulumi.interpolate`${functionApp.id}/functions/${orchestratorFunctionName}`,
            maxEventsPerBatch: 1,
            preferredBatchSizeInKilobytes: 64,
        },
        filter: {
            includedEventTypes: ["Microsoft.Storage.BlobCreated"],
            subjectBeginsWith: `/blobServices/default/containers/${settings.inputContainer}/`,
        },
        eventDeliverySchema: eventgrid.EventDeliverySchema.EventGridSchema,
    });

    return {
        resourceGroupName: resourceGroup.name,
        storageAccountName: account.name,
        hostingPlanId: plan.id,
        hostingPlanName: plan.name,
        hostingPlanLocation: plan.location,
        hostingPlanSkuName: planConfig.sku.name,
        functionAppId: functionApp.id,
        functionAppName: functionApp.name,
        functionAppUrl: pulumi.interpolate`https://${functionApp.defaultHostName}`,
        identityPrincipalId: identity.principalId,
        workerRuntime: workerRuntimeOf(settings.runtime),
        eventGridTopicName: topic.name,
        eventSubscriptionId: subscription.id,
    };
}
