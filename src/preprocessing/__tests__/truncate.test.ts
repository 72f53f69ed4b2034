import { describe, it, expect } from "vitest";
import { truncateBytes, truncateWords } from "../truncate";

const text = [
    ["abc", "de"],
    ["fgh", "ij"],
];

describe("truncateBytes", () => {
    it("keeps whole sentences that fit and cuts the crossing token", () => {
        expect(truncateBytes(text, 7)).toEqual([["abc", "de"], ["fg"]]);
    });

    it("stops after a sentence that ends exactly at the limit", () => {
        expect(truncateBytes(text, 5)).toEqual([["abc", "de"]]);
    });

    it("ends the text at a token that reaches the limit exactly", () => {
        expect(truncateBytes(text, 8)).toEqual([["abc", "de"], ["fgh"]]);
    });

    it("returns everything when the limit is not reached", () => {
        expect(truncateBytes(text, 100)).toEqual(text);
    });

    it("counts UTF-8 bytes and never splits a character", () => {
        expect(truncateBytes([["ééé"]], 3)).toEqual([["é"]]);
    });

    it("does not modify its input", () => {
        const input = [["abc", "de"]];
        truncateBytes(input, 2);
        expect(input).toEqual([["abc", "de"]]);
    });
});

describe("truncateWords", () => {
    it("cuts the sentence that crosses the limit", () => {
        expect(truncateWords(text, 3)).toEqual([["abc", "de"], ["fgh"]]);
    });

    it("stops after a sentence that ends exactly at the limit", () => {
        expect(truncateWords(text, 2)).toEqual([["abc", "de"]]);
    });

    it("returns everything when the limit is not reached", () => {
        expect(truncateWords(text, 10)).toEqual(text);
    });
});
