/**
 * @fileoverview Unit tests for engine configuration resolution
 */

import { describe, it, expect } from "vitest";
import { ResourceLoadError } from "../contracts/errors.js";
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "../engine/config.js";

describe("resolveEngineConfig", () => {
    it("should return the documented defaults for an empty config", () => {
        const config = resolveEngineConfig();

        expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
        expect(config.shortDocumentPenalty).toEqual({ minSentences: 3, maxFactor: 1.5 });
        expect(config.overlapMergeThreshold).toBe(0);
        expect(config.runDeadlineMs).toBeNull();
        expect(config.categoryWeights.FEAR_APPEAL).toBe(1);
        expect(config.severityBands.map(band => band.label)).toEqual(["low", "moderate", "high"]);
    });

    it("should merge partial options over the defaults", () => {
        const config = resolveEngineConfig({
            categoryWeights     : { GUILT_INDUCTION: 2 },
            categoryEnabled     : { FALSE_DICHOTOMY: false },
            shortDocumentPenalty: { maxFactor: 2 },
            runDeadlineMs       : 250,
            pressureEntityTypes : ["person", "norp"],
        });

        expect(config.categoryWeights.GUILT_INDUCTION).toBe(2);
        expect(config.categoryWeights.FEAR_APPEAL).toBe(1);
        expect(config.categoryEnabled.FALSE_DICHOTOMY).toBe(false);
        expect(config.categoryEnabled.FEAR_APPEAL).toBe(true);
        expect(config.shortDocumentPenalty).toEqual({ minSentences: 3, maxFactor: 2 });
        expect(config.runDeadlineMs).toBe(250);
        expect(config.pressureEntityTypes).toEqual(["PERSON", "NORP"]);
    });

    it("should freeze the result", () => {
        const config = resolveEngineConfig({ runDeadlineMs: 10 });

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.categoryWeights)).toBe(true);
    });

    it("should list every invalid option in one error", () => {
        let caught: unknown;
        try {
            resolveEngineConfig({
                overlapMergeThreshold: 1.5,
                shortDocumentPenalty : { minSentences: 2.5, maxFactor: 0.5 },
                runDeadlineMs        : -1,
                intensifierBoost     : 3,
                severityBands        : [{ min: 0.5, label: "high" }, { min: 0.2, label: "low" }],
            });
        }
        catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ResourceLoadError);
        if (!(caught instanceof ResourceLoadError)) {
            return;
        }
        expect(caught.source).toBe("engine-config");
        expect(caught.issues).toEqual([
            "shortDocumentPenalty.minSentences must be a non-negative integer",
            "shortDocumentPenalty.maxFactor must be at least 1",
            "runDeadlineMs must be a non-negative number",
            "overlapMergeThreshold must be between 0 and 1",
            "intensifierBoost must be between 1 and 2",
            "severityBands must be in strictly ascending order of min",
        ]);
    });

    it("should reject negative weights", () => {
        expect(() => resolveEngineConfig({ categoryWeights: { FEAR_APPEAL: -1 } }))
            .toThrow("categoryWeights.FEAR_APPEAL must be a non-negative number");
    });

    it("should reject an empty band list", () => {
        expect(() => resolveEngineConfig({ severityBands: [] })).toThrow("severityBands must not be empty");
    });
});
