import * as pulumi from "@pulumi/pulumi";
import { z } from "zod";
import { ConfigurationError, isFlexConsumption } from "./hosting";

const AppSettingSchema = z.object({
    name: z.string().min(1),
    value: z.string(),
});

// Stack values arrive as strings; these coerce them so a bad value surfaces as a schema issue.
const booleanString = z.enum(["true", "false"]).transform(value => value === "true");

const integerString = z.coerce.number().int();

const jsonString = z.string().transform((raw, ctx): unknown => {
    try {
        return JSON.parse(raw);
    } catch (err) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be JSON (${err instanceof Error ? err.message : String(err)})`,
        });
        return z.NEVER;
    }
});

export const StackSettingsSchema = z.object({
    namePrefix: z.string().regex(/^[a-z][a-z0-9-]{1,20}$/, "must be lowercase alphanumeric or '-'").default("docpipeline"),
    environment: z.string().min(1).default("dev"),
    location: z.string().min(1).default("eastus"),
    appName: z.string().min(1).optional(),
    planName: z.string().min(1).optional(),
    skuTier: z.enum(["FlexConsumption", "Dynamic", "ElasticPremium", "Standard"]).default("FlexConsumption"),
    skuName: z.string().min(1).default("FC1"),
    zoneRedundant: booleanString.default("false"),
    runtime: z.enum(["python", "node", "dotnet", "java", "powershell"]).default("python"),
    maximumInstanceCount: integerString.min(1).max(1000).optional(),
    instanceMemoryMB: integerString.pipe(z.union([z.literal(2048), z.literal(4096)])).optional(),
    networkIsolation: booleanString.default("false"),
    vnetAddressPrefix: z.string().default("10.10.0.0/16"),
    subnetAddressPrefix: z.string().default("10.10.1.0/24"),
    appPurpose: z.string().min(1).default("processing"),
    appConfigName: z.string().min(1).optional(),
    appSettings: jsonString.pipe(z.array(AppSettingSchema)).default("[]"),
    inputContainer: z.string().min(3).default("bronze"),
    outputContainer: z.string().min(3).default("silver"),
    storageSuffix: z.string().min(1).default("core.windows.net"),
    logRetentionDays: integerString.min(30).max(730).default(30),
});

type ParsedSettings = z.infer<typeof StackSettingsSchema>;

export type StackSettings = ParsedSettings & {
    appName: string;
    planName: string;
    resourceGroupName: string;
};

function readRaw(config: pulumi.Config): Record<string, string | undefined> {
    return {
        namePrefix: config.get("namePrefix"),
        environment: config.get("environment"),
        location: config.get("location"),
        appName: config.get("appName"),
        planName: config.get("planName"),
        skuTier: config.get("skuTier"),
        skuName: config.get("skuName"),
        zoneRedundant: config.get("zoneRedundant"),
        runtime: config.get("runtime"),
        maximumInstanceCount: config.get("maximumInstanceCount"),
        instanceMemoryMB: config.get("instanceMemoryMB"),
        networkIsolation: config.get("networkIsolation"),
        vnetAddressPrefix: config.get("vnetAddressPrefix"),
        subnetAddressPrefix: config.get("subnetAddressPrefix"),
        appPurpose: config.get("appPurpose"),
        appConfigName: config.get("appConfigName"),
        appSettings: config.get("appSettings"),
        inputContainer: config.get("inputContainer"),
        outputContainer: config.get("outputContainer"),
        storageSuffix: config.get("storageSuffix"),
        logRetentionDays: config.get("logRetentionDays"),
    };
}

/**
 * Reads and validates the stack configuration.
 *
 * The SKU/tier pairing is left to the hosting plan resolver; everything else is
 * checked here so that a bad stack fails before any resource is registered.
 */
export function loadSettings(config: pulumi.Config): StackSettings {
    const parsed = StackSettingsSchema.safeParse(readRaw(config));
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigurationError("InvalidParameter", issues.join("; "));
    }
    const settings = parsed.data;

    if (!isFlexConsumption(settings.skuTier)) {
        for (const key of ["maximumInstanceCount", "instanceMemoryMB"] as const) {
            if (settings[key] !== undefined) {
                throw new ConfigurationError(
                    "IncompatibleFieldForTier",
                    `'${key}' only applies to FlexConsumption plans, not '${settings.skuTier}'`,
                );
            }
        }
    }

    const suffix = `${settings.namePrefix}-${settings.environment}`;
    return {
        ...settings,
        appName: settings.appName ?? `func-${suffix}`,
        planName: settings.planName ?? `plan-${suffix}`,
        resourceGroupName: `rg-${suffix}`,
    };
}
