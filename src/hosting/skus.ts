import type { SkuName, SkuTier } from "./types";

const allowedSkus: Record<SkuTier, readonly SkuName[]> = {
    FlexConsumption: ["FC1"],
    Dynamic: ["Y1"],
    ElasticPremium: ["EP1", "EP2", "EP3"],
    Standard: ["S1", "S2", "S3", "P0v3", "P1v3", "P2v3", "P3v3"],
};

export function allowedSkuNames(tier: SkuTier): readonly SkuName[] {
    return allowedSkus[tier];
}

export function isSkuForTier(tier: SkuTier, name: string): name is SkuName {
    return allowedSkus[tier].some(sku => sku === name);
}

export function isFlexConsumption(tier: SkuTier): tier is "FlexConsumption" {
    return tier === "FlexConsumption";
}

