import { describe, expect, it } from "vitest";
import { ConfigurationError, allowedSkuNames, resolveHostingPlan } from "../src/hosting";
import type { ClassicSkuTier, HostingPlanSpec, SkuTier } from "../src/hosting";

function planSpec(skuTier: SkuTier, skuName: string, zoneRedundant = false): HostingPlanSpec {
    return { kind: "FunctionApp", name: "plan-test", skuTier, skuName, zoneRedundant, location: "eastus" };
}

function resolveError(spec: HostingPlanSpec): ConfigurationError {
    try {
        resolveHostingPlan(spec);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            return err;
        }
        throw err;
    }
    throw new Error("expected resolveHostingPlan to fail");
}

const classicTiers: ClassicSkuTier[] = ["Dynamic", "ElasticPremium", "Standard"];

describe("resolveHostingPlan", () => {
    it("emits the caller's zoneRedundant value on Flex Consumption", () => {
        expect(resolveHostingPlan(planSpec("FlexConsumption", "FC1", true)).zoneRedundant).toBe(true);

        const plan = resolveHostingPlan(planSpec("FlexConsumption", "FC1", false));
        expect("zoneRedundant" in plan).toBe(true);
        expect(plan.zoneRedundant).toBe(false);
    });

    it("produces the Flex plan document", () => {
        expect(resolveHostingPlan(planSpec("FlexConsumption", "FC1", true))).toEqual({
            name: "plan-test",
            location: "eastus",
            kind: "functionapp",
            reserved: true,
            sku: { name: "FC1", tier: "FlexConsumption" },
            zoneRedundant: true,
        });
    });

    for (const tier of classicTiers) {
        it(`omits zoneRedundant entirely for ${tier}`, () => {
            for (const skuName of allowedSkuNames(tier)) {
                const plan = resolveHostingPlan(planSpec(tier, skuName, true));
                expect("zoneRedundant" in plan).toBe(false);
                expect(JSON.stringify(plan)).not.toContain("zoneRedundant");
                expect(plan.sku).toEqual({ name: skuName, tier });
            }
        });
    }

    it("rejects a SKU from another tier", () => {
        const err = resolveError(planSpec("Dynamic", "EP1"));
        expect(err.code).toBe("InvalidSkuForTier");
        expect(err.message).toBe("InvalidSkuForTier: SKU 'EP1' is not available for tier 'Dynamic' (allowed: Y1)");
    });

    const mismatches: Array<[SkuTier, string]> = [
        ["FlexConsumption", "Y1"],
        ["Dynamic", "FC1"],
        ["ElasticPremium", "S1"],
        ["Standard", "EP2"],
        ["Standard", "B1"],
        ["FlexConsumption", "fc1"],
    ];

    it.each(mismatches)("rejects %s/%s", (tier, skuName) => {
        expect(resolveError(planSpec(tier, skuName)).code).toBe("InvalidSkuForTier");
    });

    it("is deterministic", () => {
        const spec = planSpec("ElasticPremium", "EP2", true);
        expect(JSON.stringify(resolveHostingPlan(spec))).toBe(JSON.stringify(resolveHostingPlan(spec)));
    });
});
