import { describe, it, expect } from "vitest";
import * as path from "path";
import { DEFAULT_DATA_DIR, exceptionsDirFor, parseRouge155Args, stopwordsPathFor } from "../config";
import { ConfigurationError } from "../errors";

describe("parseRouge155Args", () => {
    it("fills in the ROUGE-1.5.5 defaults", () => {
        const args = parseRouge155Args();
        expect(args.b).toBe(0);
        expect(args.l).toBe(0);
        expect(args.m).toBe(false);
        expect(args.s).toBe(false);
        expect(args.n).toBe(4);
        expect(args.f).toBe("A");
        expect(args.p).toBe(0.5);
        expect(args.e).toBeNull();
    });

    it("keeps the given values", () => {
        const args = parseRouge155Args({ n: 2, f: "B", p: 0.8, m: true, b: 665 });
        expect(args).toMatchObject({ n: 2, f: "B", p: 0.8, m: true, b: 665 });
    });

    it("accepts options that have no effect", () => {
        expect(parseRouge155Args({ x: true, c: 0.9, r: 500 }).n).toBe(4);
    });

    it("names the offending option", () => {
        expect(() => parseRouge155Args({ p: 1.5 })).toThrow(ConfigurationError);
        expect(() => parseRouge155Args({ p: 1.5 })).toThrow(/^Invalid ROUGE options: -p: /);
    });
});

describe("data paths", () => {
    it("locates the bundled files under the data directory", () => {
        expect(stopwordsPathFor(DEFAULT_DATA_DIR)).toBe(path.join(DEFAULT_DATA_DIR, "smart_common_words.txt"));
        expect(exceptionsDirFor("/opt/rouge/data")).toBe(path.join("/opt/rouge/data", "WordNet-2.0-Exceptions"));
    });
});
