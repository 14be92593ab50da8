import { ConfigurationError } from "./errors";
import { allowedSkuNames, isSkuForTier } from "./skus";
import type {
    ClassicHostingPlanConfig,
    ClassicSkuTier,
    FlexHostingPlanConfig,
    HostingPlanConfig,
    HostingPlanSpec,
    SkuName,
} from "./types";

function flexPlan(spec: HostingPlanSpec): FlexHostingPlanConfig {
    return {
        name: spec.name,
        location: spec.location,
        kind: "functionapp",
        reserved: true,
        sku: { name: "FC1", tier: "FlexConsumption" },
        zoneRedundant: spec.zoneRedundant,
    };
}

// zoneRedundant is left off entirely: classic tiers reject the property whatever its value.
function classicPlan(spec: HostingPlanSpec, tier: ClassicSkuTier, skuName: SkuName): ClassicHostingPlanConfig {
    return {
        name: spec.name,
        location: spec.location,
        kind: "functionapp",
        reserved: true,
        sku: { name: skuName, tier },
    };
}

/**
 * Resolves the hosting plan document for a Function App plan.
 *
 * @throws ConfigurationError `InvalidSkuForTier` when the SKU name does not belong to the tier.
 */
export function resolveHostingPlan(spec: HostingPlanSpec): HostingPlanConfig {
    const tier = spec.skuTier;
    const skuName = spec.skuName;
    if (!isSkuForTier(tier, skuName)) {
        throw new ConfigurationError(
            "InvalidSkuForTier",
            `SKU '${skuName}' is not available for tier '${tier}' (allowed: ${allowedSkuNames(tier).join(", ")})`,
        );
    }

    if (tier === "FlexConsumption") {
        return flexPlan(spec);
    }
    return classicPlan(spec, tier, skuName);
}
