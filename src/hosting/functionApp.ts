import {
    classicRuntimeSettings,
    identitySettings,
    ipSecurityRestrictions,
    networkSettings,
    purposeSettings,
} from "./appSettings";
import { missingReference } from "./errors";
import { resolveRuntime } from "./runtime";
import { isFlexConsumption } from "./skus";
import type {
    AppRuntimeSpec,
    AppSetting,
    ClassicFunctionAppConfig,
    FlexFunctionAppConfig,
    FunctionAppConfig,
    FunctionAppDeploymentConfig,
    HostingPlanRef,
    IdentityRef,
    RuntimeDescriptor,
    SiteConfigBase,
} from "./types";

export const defaultMaximumInstanceCount = 100;
export const defaultInstanceMemoryMB = 2048;
export const defaultStorageSuffix = "core.windows.net";
export const deploymentContainerName = "deployment";

type CommonFields = Omit<FlexFunctionAppConfig, "siteConfig" | "functionAppConfig">;

function present(value: string | undefined): value is string {
    return value !== undefined && value !== "";
}

function commonFields(spec: AppRuntimeSpec, plan: HostingPlanRef): CommonFields {
    const fields: CommonFields = {
        name: spec.name,
        location: spec.location,
        kind: "functionapp,linux",
        serverFarmId: plan.id,
        httpsOnly: true,
    };
    if (spec.identity !== undefined) {
        fields.identity = { type: "UserAssigned", userAssignedIdentities: [spec.identity.resourceId] };
    }
    if (spec.networkIsolation && present(spec.subnetId)) {
        fields.virtualNetworkSubnetId = spec.subnetId;
    }
    return fields;
}

function siteConfigBase(spec: AppRuntimeSpec, modelSettings: AppSetting[]): SiteConfigBase {
    const isolated = spec.networkIsolation;
    const siteConfig: SiteConfigBase = {
        appSettings: [
            ...spec.appSettingsBase,
            ...identitySettings(spec),
            ...modelSettings,
            ...networkSettings(isolated),
            ...purposeSettings(spec.appPurpose),
        ],
        ipSecurityRestrictions: ipSecurityRestrictions(isolated),
        ipSecurityRestrictionsDefaultAction: isolated ? "Deny" : "Allow",
        vnetRouteAllEnabled: isolated,
        minTlsVersion: "1.2",
        ftpsState: "Disabled",
    };
    // Left unset under isolation; inbound traffic is then governed by the restriction rules.
    if (!isolated) {
        siteConfig.publicNetworkAccess = "Enabled";
    }
    return siteConfig;
}

function deploymentConfig(
    spec: AppRuntimeSpec,
    runtime: RuntimeDescriptor,
    identity: IdentityRef,
    storageName: string,
): FunctionAppDeploymentConfig {
    const suffix = spec.storageSuffix ?? defaultStorageSuffix;
    return {
        runtime: { name: runtime.name, version: runtime.version },
        scaleAndConcurrency: {
            maximumInstanceCount: spec.maximumInstanceCount ?? defaultMaximumInstanceCount,
            instanceMemoryMB: spec.instanceMemoryMB ?? defaultInstanceMemoryMB,
        },
        deployment: {
            storage: {
                type: "blobContainer",
                value: `https://${storageName}.blob.${suffix}/${deploymentContainerName}`,
                authentication: {
                    type: "UserAssignedIdentity",
                    userAssignedIdentityResourceId: identity.resourceId,
                },
            },
        },
    };
}

function flexFunctionApp(spec: AppRuntimeSpec, plan: HostingPlanRef, runtime: RuntimeDescriptor): FlexFunctionAppConfig {
    const identity = spec.identity;
    if (identity === undefined || !present(identity.resourceId)) {
        throw missingReference("identityId", "to authenticate Flex Consumption deployment storage");
    }
    if (!present(spec.funcStorageName)) {
        throw missingReference("funcStorageName", "to describe Flex Consumption deployment storage");
    }

    return {
        ...commonFields(spec, plan),
        siteConfig: siteConfigBase(spec, []),
        functionAppConfig: deploymentConfig(spec, runtime, identity, spec.funcStorageName),
    };
}

function classicFunctionApp(
    spec: AppRuntimeSpec,
    plan: HostingPlanRef,
    runtime: RuntimeDescriptor,
): ClassicFunctionAppConfig {
    return {
        ...commonFields(spec, plan),
        siteConfig: {
            ...siteConfigBase(spec, classicRuntimeSettings(runtime)),
            alwaysOn: true,
            linuxFxVersion: runtime.linuxFxVersion,
        },
    };
}

/**
 * Resolves the Function App document for the plan it is sited on.
 *
 * Flex Consumption and classic plans take incompatible shapes, so each has its own
 * builder and neither document can carry the other's fields.
 *
 * @throws ConfigurationError `MissingRequiredReference` when a reference the selected
 * shape depends on is absent.
 */
export function resolveFunctionApp(spec: AppRuntimeSpec, hostingPlanRef: HostingPlanRef | undefined): FunctionAppConfig {
    if (hostingPlanRef === undefined || !present(hostingPlanRef.id)) {
        throw missingReference("hostingPlanRef", "to site the Function App");
    }
    if (spec.networkIsolation && !present(spec.subnetId)) {
        throw missingReference("subnetId", "when network isolation is enabled");
    }

    const runtime = resolveRuntime(spec.runtime);
    if (isFlexConsumption(hostingPlanRef.skuTier)) {
        return flexFunctionApp(spec, hostingPlanRef, runtime);
    }
    return classicFunctionApp(spec, hostingPlanRef, runtime);
}

export function isFlexFunctionApp(app: FunctionAppConfig): app is FlexFunctionAppConfig {
    return app.functionAppConfig !== undefined;
}
