export type PlanKind = "FunctionApp";

export type SkuTier = "FlexConsumption" | "Dynamic" | "ElasticPremium" | "Standard";

export type ClassicSkuTier = Exclude<SkuTier, "FlexConsumption">;

export type SkuName =
    | "FC1"
    | "Y1"
    | "EP1" | "EP2" | "EP3"
    | "S1" | "S2" | "S3"
    | "P0v3" | "P1v3" | "P2v3" | "P3v3";

export type Runtime = "python" | "node" | "dotnet" | "java" | "powershell";

export type InstanceMemoryMB = 2048 | 4096;

export interface HostingPlanSpec {
    kind: PlanKind;
    name: string;
    skuTier: SkuTier;
    skuName: string;
    zoneRedundant: boolean;
    location: string;
}

interface HostingPlanConfigBase {
    name: string;
    location: string;
    kind: "functionapp";
    // Linux worker.
    reserved: true;
}

export interface FlexHostingPlanConfig extends HostingPlanConfigBase {
    sku: { name: "FC1"; tier: "FlexConsumption" };
    zoneRedundant: boolean;
}

export interface ClassicHostingPlanConfig extends HostingPlanConfigBase {
    sku: { name: SkuName; tier: ClassicSkuTier };
    zoneRedundant?: never;
}

export type HostingPlanConfig = FlexHostingPlanConfig | ClassicHostingPlanConfig;

/** What the Function App needs to know about the plan it is sited on. */
export interface HostingPlanRef {
    id: string;
    skuTier: SkuTier;
}

export interface AppSetting {
    name: string;
    value: string;
}

export interface IdentityRef {
    resourceId: string;
    clientId: string;
}

export interface AppRuntimeSpec {
    name: string;
    location: string;
    runtime: Runtime;
    appPurpose: string;
    appSettingsBase: AppSetting[];
    networkIsolation: boolean;
    subnetId?: string;
    maximumInstanceCount?: number;
    instanceMemoryMB?: InstanceMemoryMB;
    identity?: IdentityRef;
    funcStorageName?: string;
    storageSuffix?: string;
    appInsightsInstrumentationKey?: string;
    appConfigName?: string;
}

export interface RuntimeDescriptor {
    /** Runtime name as the Functions host knows it, e.g. `dotnet-isolated`. */
    name: string;
    version: string;
    linuxFxVersion: string;
}

export interface IpSecurityRestriction {
    name: string;
    ipAddress: string;
    tag: "ServiceTag";
    action: "Allow";
    priority: number;
}

export interface SiteConfigBase {
    appSettings: AppSetting[];
    ipSecurityRestrictions: IpSecurityRestriction[];
    ipSecurityRestrictionsDefaultAction: "Allow" | "Deny";
    publicNetworkAccess?: "Enabled";
    vnetRouteAllEnabled: boolean;
    minTlsVersion: "1.2";
    ftpsState: "Disabled";
}

export interface FlexSiteConfig extends SiteConfigBase {
    alwaysOn?: never;
    linuxFxVersion?: never;
}

export interface ClassicSiteConfig extends SiteConfigBase {
    alwaysOn: true;
    linuxFxVersion: string;
}

export interface FunctionAppDeploymentConfig {
    runtime: { name: string; version: string };
    scaleAndConcurrency: { maximumInstanceCount: number; instanceMemoryMB: InstanceMemoryMB };
    deployment: {
        storage: {
            type: "blobContainer";
            value: string;
            authentication: {
                type: "UserAssignedIdentity";
                userAssignedIdentityResourceId: string;
            };
        };
    };
}

export interface ManagedIdentityConfig {
    type: "UserAssigned";
    userAssignedIdentities: string[];
}

interface FunctionAppConfigBase {
    name: string;
    location: string;
    kind: "functionapp,linux";
    serverFarmId: string;
    httpsOnly: true;
    identity?: ManagedIdentityConfig;
    virtualNetworkSubnetId?: string;
}

export interface FlexFunctionAppConfig extends FunctionAppConfigBase {
    siteConfig: FlexSiteConfig;
    functionAppConfig: FunctionAppDeploymentConfig;
}

export interface ClassicFunctionAppConfig extends FunctionAppConfigBase {
    siteConfig: ClassicSiteConfig;
    functionAppConfig?: never;
}

export type FunctionAppConfig = FlexFunctionAppConfig | ClassicFunctionAppConfig;
