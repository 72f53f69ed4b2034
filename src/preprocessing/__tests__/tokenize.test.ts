import { describe, it, expect } from "vitest";
import { join } from "path";
import { createRouge155Tokenizer, preprocessText, tokenizeSentence } from "../tokenize";
import { KEEP_STOPWORDS, NO_STEMMING } from "../words";
import { ConfigurationError } from "../../errors";

const plain = { stem: false, removeStopwords: false };
const exceptionsDir = join(process.cwd(), "test-fixtures", "rouge-data", "WordNet-2.0-Exceptions");

describe("preprocessText", () => {
    it("isolates hyphens and blanks other punctuation", () => {
        expect(preprocessText("well-known, isn't it?")).toBe("well - known isn t it");
    });

    it("trims and collapses whitespace", () => {
        expect(preprocessText("  lots   of\tspace  ")).toBe("lots of space");
    });
});

describe("tokenizeSentence", () => {
    it("drops the isolated hyphens", () => {
        expect(tokenizeSentence("State-of-the-art", KEEP_STOPWORDS, NO_STEMMING)).toEqual([
            "state",
            "of",
            "the",
            "art",
        ]);
    });
});

describe("createRouge155Tokenizer", () => {
    it("splits sentences on newlines and lowercases", () => {
        const tokenizer = createRouge155Tokenizer(plain);
        expect(tokenizer.tokenizeText("The cat sat.\nThe dog ran")).toEqual([
            ["the", "cat", "sat"],
            ["the", "dog", "ran"],
        ]);
    });

    it("removes stopwords by default, keeping empty sentences", () => {
        const tokenizer = createRouge155Tokenizer();
        expect(tokenizer.tokenizeText("The cats were running\n")).toEqual([["cats", "running"], []]);
    });

    it("stems after removing stopwords", () => {
        const tokenizer = createRouge155Tokenizer({ stem: true, exceptionsDir });
        expect(tokenizer.tokenizeText("The cats were running")).toEqual([["cat", "run"]]);
        expect(tokenizer.tokenizeText("The best children afterwards")).toEqual([["child"]]);
    });

    it("maps irregular verbs through the exception tables", () => {
        const tokenizer = createRouge155Tokenizer({ stem: true, removeStopwords: false, exceptionsDir });
        expect(tokenizer.tokenizeText("said says knew know got get")).toEqual([
            ["sai", "sai", "know", "know", "get", "get"],
        ]);
    });

    it("requires the exception directory for stemming", () => {
        expect(() => createRouge155Tokenizer({ stem: true, removeStopwords: false })).toThrow(
            "Stemming requires exceptionsDir, the WordNet 2.0 exception directory"
        );
        expect(() =>
            createRouge155Tokenizer({ stem: true, removeStopwords: false, exceptionsDir: "/nonexistent/exceptions" })
        ).toThrow(ConfigurationError);
    });

    it("truncates to a byte limit", () => {
        const tokenizer = createRouge155Tokenizer({ ...plain, byteLimit: 10 });
        const tokens = tokenizer.tokenizeText("alpha beta gamma\ndelta");
        expect(tokens).toEqual([["alpha", "beta", "g"]]);
        expect(tokens.flat().join("").length).toBe(10);
    });

    it("truncates to a word limit", () => {
        const tokenizer = createRouge155Tokenizer({ ...plain, wordLimit: 4 });
        expect(tokenizer.tokenizeText("one two three\nfour five\nsix")).toEqual([
            ["one", "two", "three"],
            ["four"],
        ]);
    });

    it("applies the byte limit before the word limit", () => {
        const tokenizer = createRouge155Tokenizer({ ...plain, byteLimit: 10, wordLimit: 2 });
        expect(tokenizer.tokenizeText("alpha beta gamma\ndelta")).toEqual([["alpha", "beta"]]);
    });

    it("exposes its configuration", () => {
        const tokenizer = createRouge155Tokenizer(plain);
        expect(tokenizer.stopwords).toEqual(KEEP_STOPWORDS);
        expect(tokenizer.stemming).toEqual(NO_STEMMING);
        expect(tokenizer.byteLimit).toBe(0);
        expect(tokenizer.wordLimit).toBe(0);
    });

    it("fails construction when a data file is missing", () => {
        expect(() =>
            createRouge155Tokenizer({ removeStopwords: true, stopwordsPath: "/nonexistent/stopwords.txt" })
        ).toThrow(ConfigurationError);
    });

    it("does not read data files it does not need", () => {
        expect(() =>
            createRouge155Tokenizer({ ...plain, stopwordsPath: "/nonexistent/stopwords.txt" })
        ).not.toThrow();
    });
});
