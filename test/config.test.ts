import * as pulumi from "@pulumi/pulumi";
import { describe, expect, it } from "vitest";
import { loadSettings } from "../src/config";
import { ConfigurationError, resolveHostingPlan } from "../src/hosting";

// Each case reads its own config namespace so values set by one case never leak into another.
function configWith(namespace: string, values: Record<string, string>): pulumi.Config {
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
        entries[`${namespace}:${key}`] = value;
    }
    pulumi.runtime.setAllConfig(entries);
    return new pulumi.Config(namespace);
}

function loadError(config: pulumi.Config): ConfigurationError {
    try {
        loadSettings(config);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            return err;
        }
        throw err;
    }
    throw new Error("expected loadSettings to fail");
}

describe("loadSettings", () => {
    it("applies defaults to an empty stack", () => {
        const settings = loadSettings(configWith("defaults", {}));
        expect(settings).toMatchObject({
            location: "eastus",
            environment: "dev",
            skuTier: "FlexConsumption",
            skuName: "FC1",
            zoneRedundant: false,
            runtime: "python",
            networkIsolation: false,
            appPurpose: "processing",
            appSettings: [],
            inputContainer: "bronze",
            outputContainer: "silver",
            storageSuffix: "core.windows.net",
            logRetentionDays: 30,
            appName: "func-docpipeline-dev",
            planName: "plan-docpipeline-dev",
            resourceGroupName: "rg-docpipeline-dev",
        });
        expect(settings.maximumInstanceCount).toBeUndefined();
        expect(settings.instanceMemoryMB).toBeUndefined();
    });

    it("reads typed values", () => {
        const settings = loadSettings(configWith("typed", {
            namePrefix: "invoices",
            environment: "prod",
            skuTier: "Dynamic",
            skuName: "Y1",
            runtime: "node",
            networkIsolation: "true",
            appConfigName: "appcs-invoices",
            appSettings: JSON.stringify([{ name: "NEXT_STAGE", value: "silver" }]),
        }));
        expect(settings.skuTier).toBe("Dynamic");
        expect(settings.runtime).toBe("node");
        expect(settings.networkIsolation).toBe(true);
        expect(settings.appConfigName).toBe("appcs-invoices");
        expect(settings.appSettings).toEqual([{ name: "NEXT_STAGE", value: "silver" }]);
        expect(settings.appName).toBe("func-invoices-prod");
    });

    it("keeps explicit resource names", () => {
        const settings = loadSettings(configWith("named", { appName: "func-custom", planName: "plan-custom" }));
        expect(settings.appName).toBe("func-custom");
        expect(settings.planName).toBe("plan-custom");
    });

    it("reads Flex scaling", () => {
        const settings = loadSettings(configWith("scaling", {
            maximumInstanceCount: "40",
            instanceMemoryMB: "4096",
        }));
        expect(settings.maximumInstanceCount).toBe(40);
        expect(settings.instanceMemoryMB).toBe(4096);
    });

    it("rejects an unknown tier", () => {
        const err = loadError(configWith("badtier", { skuTier: "Premium" }));
        expect(err.code).toBe("InvalidParameter");
        expect(err.message).toContain("skuTier");
    });

    it("rejects an unsupported instance size", () => {
        const err = loadError(configWith("badmemory", { instanceMemoryMB: "3072" }));
        expect(err.code).toBe("InvalidParameter");
        expect(err.message).toContain("instanceMemoryMB");
    });

    it("rejects malformed app settings", () => {
        const err = loadError(configWith("badsettings", { appSettings: JSON.stringify([{ value: "x" }]) }));
        expect(err.code).toBe("InvalidParameter");
        expect(err.message).toContain("appSettings.0.name");
    });

    const badlyTyped: Array<[string, string]> = [
        ["zoneRedundant", "yes"],
        ["networkIsolation", "on"],
        ["maximumInstanceCount", "many"],
        ["logRetentionDays", "a month"],
        ["appSettings", "{not json"],
    ];

    it.each(badlyTyped)("rejects %s=%s as an invalid parameter", (key, value) => {
        const err = loadError(configWith(`badtype-${key}`, { [key]: value }));
        expect(err.code).toBe("InvalidParameter");
        expect(err.message.startsWith(`InvalidParameter: ${key}: `)).toBe(true);
    });

    it("rejects app settings that are not JSON", () => {
        const err = loadError(configWith("notjson", { appSettings: "{not json" }));
        expect(err.message).toMatch(/^InvalidParameter: appSettings: must be JSON \(/);
    });

    it("rejects a fractional instance count", () => {
        const err = loadError(configWith("fraction", { maximumInstanceCount: "2.5" }));
        expect(err.code).toBe("InvalidParameter");
        expect(err.message).toContain("maximumInstanceCount");
    });

    it("rejects Flex scaling on a classic tier", () => {
        const err = loadError(configWith("classicscale", {
            skuTier: "ElasticPremium",
            skuName: "EP1",
            maximumInstanceCount: "20",
        }));
        expect(err.code).toBe("IncompatibleFieldForTier");
        expect(err.message).toBe(
            "IncompatibleFieldForTier: 'maximumInstanceCount' only applies to FlexConsumption plans, not 'ElasticPremium'",
        );
    });

    it("accepts zoneRedundant on a classic tier and leaves it to the plan resolver", () => {
        const settings = loadSettings(configWith("classiczone", {
            skuTier: "Standard",
            skuName: "P1v3",
            zoneRedundant: "true",
        }));
        expect(settings.zoneRedundant).toBe(true);

        const plan = resolveHostingPlan({
            kind: "FunctionApp",
            name: settings.planName,
            skuTier: settings.skuTier,
            skuName: settings.skuName,
            zoneRedundant: settings.zoneRedundant,
            location: settings.location,
        });
        expect("zoneRedundant" in plan).toBe(false);
    });

    it("leaves the SKU/tier pairing to the plan resolver", () => {
        const settings = loadSettings(configWith("mismatch", { skuTier: "Dynamic", skuName: "EP1" }));
        expect(settings.skuName).toBe("EP1");
        expect(() => resolveHostingPlan({
            kind: "FunctionApp",
            name: settings.planName,
            skuTier: settings.skuTier,
            skuName: settings.skuName,
            zoneRedundant: settings.zoneRedundant,
            location: settings.location,
        })).toThrow(ConfigurationError);
    });
});
