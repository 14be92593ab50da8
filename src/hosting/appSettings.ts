import type { AppRuntimeSpec, AppSetting, IpSecurityRestriction, RuntimeDescriptor } from "./types";

// Azure-provided DNS virtual IP.
const azureDnsServer = "168.63.129.16";

const eventGridServiceTag = "AzureEventGrid";

const workerIndexingFlag: AppSetting = {
    name: "AzureWebJobsFeatureFlags",
    value: "EnableWorkerIndexing",
};

export function identitySettings(spec: AppRuntimeSpec): AppSetting[] {
    const settings: AppSetting[] = [];
    if (spec.funcStorageName !== undefined) {
        settings.push({ name: "AzureWebJobsStorage__accountName", value: spec.funcStorageName });
    }
    // The host only authenticates to storage through the user-assigned identity.
    if (spec.funcStorageName !== undefined && spec.identity !== undefined) {
        settings.push({ name: "AzureWebJobsStorage__credential", value: "managedidentity" });
        settings.push({ name: "AzureWebJobsStorage__clientId", value: spec.identity.clientId });
    }
    if (spec.identity !== undefined) {
        settings.push({ name: "AZURE_CLIENT_ID", value: spec.identity.clientId });
    }
    if (spec.appInsightsInstrumentationKey !== undefined) {
        settings.push({ name: "APPINSIGHTS_INSTRUMENTATIONKEY", value: spec.appInsightsInstrumentationKey });
        settings.push({
            name: "APPLICATIONINSIGHTS_CONNECTION_STRING",
            value: `InstrumentationKey=${spec.appInsightsInstrumentationKey}`,
        });
    }
    if (spec.appConfigName !== undefined) {
        settings.push({ name: "APP_CONFIGURATION_URI", value: `https://${spec.appConfigName}.azconfig.io` });
    }
    return settings;
}

export function classicRuntimeSettings(runtime: RuntimeDescriptor): AppSetting[] {
    return [
        { name: "FUNCTIONS_WORKER_RUNTIME", value: runtime.name },
        { name: "FUNCTIONS_EXTENSION_VERSION", value: "~4" },
        { name: "ENABLE_ORYX_BUILD", value: "true" },
        { name: "SCM_DO_BUILD_DURING_DEPLOYMENT", value: "true" },
    ];
}

export function networkSettings(networkIsolation: boolean): AppSetting[] {
    return [
        { name: "WEBSITE_VNET_ROUTE_ALL", value: networkIsolation ? "1" : "0" },
        { name: "WEBSITE_DNS_SERVER", value: networkIsolation ? azureDnsServer : "" },
    ];
}

export function purposeSettings(appPurpose: string): AppSetting[] {
    return appPurpose === "processing" ? [{ ...workerIndexingFlag }] : [];
}

export function ipSecurityRestrictions(networkIsolation: boolean): IpSecurityRestriction[] {
    if (!networkIsolation) {
        return [];
    }
    return [{
        name: "AllowEventGrid",
        ipAddress: eventGridServiceTag,
        tag: "ServiceTag",
        action: "Allow",
        priority: 100,
    }];
}
