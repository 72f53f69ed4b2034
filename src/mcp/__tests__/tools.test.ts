import { describe, it, expect } from "vitest";
import { join } from "path";
import { createScorer, IncrementalSessionStore, ScoringOptionsSchema, scoreTexts } from "../tools";

describe("ScoringOptionsSchema", () => {
    it("accepts an empty object", () => {
        expect(ScoringOptionsSchema.parse({})).toEqual({});
    });

    it("rejects out-of-range values", () => {
        expect(ScoringOptionsSchema.safeParse({ n: 0 }).success).toBe(false);
        expect(ScoringOptionsSchema.safeParse({ alpha: 2 }).success).toBe(false);
        expect(ScoringOptionsSchema.safeParse({ scoring: "C" }).success).toBe(false);
    });
});

describe("createScorer", () => {
    it("maps tool options onto ROUGE options", () => {
        const scorer = createScorer({ n: 2, scoring: "B", alpha: 0.3 });
        expect(scorer.config).toEqual({ n: 2, scoring: "B", alpha: 0.3 });
    });
});

describe("scoreTexts", () => {
    it("scores a candidate against references", () => {
        expect(scoreTexts("the cat", ["the cat sat"], { n: 1 })).toEqual({
            "ROUGE-1": { R: 0.66667, P: 1, F: 0.8 },
        });
    });

    it("stems with the given data directory", () => {
        const dataDir = join(process.cwd(), "test-fixtures", "rouge-data");
        expect(scoreTexts("cats", ["cat"], { n: 1, stem: true, dataDir })).toEqual({
            "ROUGE-1": { R: 1, P: 1, F: 1 },
        });
    });
});

describe("IncrementalSessionStore", () => {
    it("keeps a session per key", () => {
        const store = new IncrementalSessionStore();
        store.reset("first", ["the cat sat on the mat"], { n: 1 });
        store.reset("second", ["a dog"], { n: 1 });

        expect(store.score("first", "the cat")["ROUGE-1"]?.R).toBeCloseTo(2 / 6, 10);
        expect(store.score("second", "the cat")["ROUGE-1"]?.R).toBe(0);
        expect(store.score("first", "mat")["ROUGE-1"]?.R).toBeCloseTo(1 / 6, 10);
    });

    it("starts over on reset", () => {
        const store = new IncrementalSessionStore();
        store.reset("s", ["a b"], { n: 2 });
        store.score("s", "a");
        store.reset("s", ["a b"], { n: 2 });
        // Without the earlier "a", "b" alone completes no bigram
        expect(store.score("s", "b")["ROUGE-2"]?.R).toBe(0);
    });

    it("ends a session", () => {
        const store = new IncrementalSessionStore();
        store.reset("s", ["a b"], { n: 1 });

        expect(store.end("s")).toBe(true);
        expect(store.has("s")).toBe(false);
        expect(store.end("s")).toBe(false);
        expect(() => store.score("s", "a")).toThrow('No incremental session "s"');
    });

    it("drops the least recently used session when full", () => {
        const store = new IncrementalSessionStore(2);
        store.reset("a", ["x y"], { n: 1 });
        store.reset("b", ["x y"], { n: 1 });
        store.score("a", "x");
        store.reset("c", ["x y"], { n: 1 });

        expect(store.size).toBe(2);
        expect(store.has("a")).toBe(true);
        expect(store.has("b")).toBe(false);
        expect(store.has("c")).toBe(true);
    });

    it("rejects unknown keys", () => {
        const store = new IncrementalSessionStore();
        expect(store.has("missing")).toBe(false);
        expect(() => store.score("missing", "text")).toThrow(
            'No incremental session "missing"; call rouge_incremental_reset first'
        );
    });
});
