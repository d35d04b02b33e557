/**
 * @fileoverview Entity pressure detector
 *
 * Threat or urgency cues in a sentence that names a person or
 * organization. Each additional cue raises confidence:
 * `1 - 0.65 ^ cueCount`. The match spans the entities and cues.
 *
 * @module @slant/engine/detectors/entityPressure
 */

import type { AnnotatedDocument, TextRange } from "../contracts/AnnotatedDocument.js";
import type { DetectorContext, DetectorPlugin } from "../contracts/DetectorPlugin.js";
import { createPatternMatch, type PatternMatch } from "../contracts/PatternMatch.js";
import { findCueHits, unionRange } from "./cues.js";

export const kPRESSURE_BASE = 0.65;

const kENTITY_PRESSURE_ID = "entity:pressure";

export function pressureConfidence(cueCount: number): number {
    return 1 - Math.pow(kPRESSURE_BASE, cueCount);
}

export const entityPressureDetector: DetectorPlugin = Object.freeze({
    id         : kENTITY_PRESSURE_ID,
    category   : "FEAR_APPEAL",
    name       : "Entity pressure",
    description: "Threat or urgency cues attached to a named person or organization",
    detect(document: AnnotatedDocument, context: DetectorContext): readonly PatternMatch[] {
        const { resources, config } = context;
        const types = new Set(config.pressureEntityTypes);
        const matches: PatternMatch[] = [];

        for (const sentence of document.sentences) {
            const entities = sentence.entities.filter(entity => types.has(entity.type));
            if (entities.length === 0) {
                continue;
            }

            const hits = [
                ...findCueHits(sentence, "FALSE_URGENCY", resources),
                ...findCueHits(sentence, "FEAR_APPEAL", resources),
            ];
            if (hits.length === 0) {
                continue;
            }

            const cueRanges: TextRange[] = hits.map(hit => ({
                start: sentence.tokens[hit.first].start,
                end  : sentence.tokens[hit.last].end,
            }));
            const span = unionRange([...entities, ...cueRanges]);
            if (!span) {
                continue;
            }

            const names = [...new Set(entities.map(entity => entity.text))].join(", ");
            const cues = [...new Set(hits.map(hit => hit.entry.key))].map(cue => `"${cue}"`).join(", ");
            matches.push(createPatternMatch(document, {
                category  : "FEAR_APPEAL",
                start     : span.start,
                end       : span.end,
                confidence: pressureConfidence(hits.length),
                rationale : `pressure involving ${names} with cue(s) ${cues}`,
                detectorId: kENTITY_PRESSURE_ID,
            }));
        }

        return matches;
    },
});
