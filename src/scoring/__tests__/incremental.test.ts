import { describe, it, expect } from "vitest";
import { createRougeScorerFromRouge155Args } from "../rouge";

const REFERENCE = "the cat sat on the mat";

describe("incremental scoring", () => {
    it("builds a session with per-n totals and an empty carry-over", () => {
        const scorer = createRougeScorerFromRouge155Args({ n: 3 });
        const session = scorer.resetIncremental([REFERENCE, "a cat"]);

        expect(session.maxN).toBe(3);
        expect(session.referenceTotals).toEqual([8, 6, 4]);
        expect(session.carryOver).toEqual(["", ""]);
    });

    it("scores only the n-grams that end in the new text", () => {
        const scorer = createRougeScorerFromRouge155Args({ n: 2 });
        let session = scorer.resetIncremental([REFERENCE]);

        const first = scorer.nScoreIncremental(session, "the cat");
        expect(first.scores["ROUGE-1"]?.R).toBeCloseTo(2 / 6, 10);
        expect(first.scores["ROUGE-2"]?.R).toBeCloseTo(1 / 5, 10);
        session = first.session;
        expect(session.carryOver).toEqual(["cat"]);

        const second = scorer.nScoreIncremental(session, "sat");
        expect(second.scores["ROUGE-1"]?.R).toBeCloseTo(1 / 6, 10);
        // "cat sat" spans both increments
        expect(second.scores["ROUGE-2"]?.R).toBeCloseTo(1 / 5, 10);
    });

    it("adds up to the batch recall", () => {
        const scorer = createRougeScorerFromRouge155Args({ n: 2 });
        const references = [REFERENCE, "a dog sat on a cat"];
        const lines = ["The cat sat.", "On the mat", "a dog"];

        let session = scorer.resetIncremental(references);
        let recall1 = 0;
        let recall2 = 0;
        for (const line of lines) {
            const step = scorer.nScoreIncremental(session, line);
            session = step.session;
            recall1 += step.scores["ROUGE-1"]?.R ?? 0;
            recall2 += step.scores["ROUGE-2"]?.R ?? 0;
        }

        const batch = scorer.nScore(lines.join("\n"), references);
        expect(recall1).toBeCloseTo(batch["ROUGE-1"]?.R ?? -1, 5);
        expect(recall2).toBeCloseTo(batch["ROUGE-2"]?.R ?? -1, 5);
    });

    it("returns null recall and the same session for text without tokens", () => {
        const scorer = createRougeScorerFromRouge155Args({ n: 2 });
        const session = scorer.resetIncremental([REFERENCE]);
        const step = scorer.nScoreIncremental(session, "?!");

        expect(step.scores).toEqual({ "ROUGE-1": { R: null }, "ROUGE-2": { R: null } });
        expect(step.session).toBe(session);
    });

    it("does not modify the session it was given", () => {
        const scorer = createRougeScorerFromRouge155Args({ n: 2 });
        const session = scorer.resetIncremental([REFERENCE]);
        scorer.nScoreIncremental(session, "the cat");
        expect(session.carryOver).toEqual([""]);
    });

    it("rejects a session built for another n", () => {
        const session = createRougeScorerFromRouge155Args({ n: 2 }).resetIncremental([REFERENCE]);
        const scorer = createRougeScorerFromRouge155Args({ n: 3 });
        expect(() => scorer.nScoreIncremental(session, "the cat")).toThrow(
            "Session was created for ROUGE-2, scorer computes ROUGE-3"
        );
    });
});
