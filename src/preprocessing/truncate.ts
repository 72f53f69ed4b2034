import type { TokenizedText } from "../types";
import { truncateUtf8, utf8ByteLength } from "../utils/shared";

/**
 * Keep only the first `byteLimit` UTF-8 bytes of the tokenized text.
 *
 * Tokens are counted without separators. Whole sentences are kept while they
 * fit. In the sentence that crosses the limit, the first token that reaches
 * the limit is cut to the remaining budget and ends the text; everything
 * after it is dropped.
 */
export function truncateBytes(text: TokenizedText, byteLimit: number): TokenizedText {
    let byteLen = 0;
    const truncated: TokenizedText = [];

    for (const sentence of text) {
        const sentenceEnd = byteLen + utf8ByteLength(sentence.join(""));

        if (sentenceEnd > byteLimit) {
            const partial: string[] = [];
            for (const token of sentence) {
                const tokenEnd = byteLen + utf8ByteLength(token);
                if (tokenEnd >= byteLimit) {
                    const cut = truncateUtf8(token, byteLimit - byteLen);
                    if (cut.length > 0) {
                        partial.push(cut);
                    }
                    truncated.push(partial);
                    byteLen = byteLimit;
                    break;
                }
                partial.push(token);
                byteLen = tokenEnd;
            }
        } else {
            truncated.push([...sentence]);
            byteLen = sentenceEnd;
        }

        if (byteLen === byteLimit) break;
    }

    return truncated;
}

/**
 * Keep only the first `wordLimit` tokens of the tokenized text
 */
export function truncateWords(text: TokenizedText, wordLimit: number): TokenizedText {
    let wordLen = 0;
    const truncated: TokenizedText = [];

    for (const sentence of text) {
        const sentenceEnd = wordLen + sentence.length;

        if (sentenceEnd > wordLimit) {
            truncated.push(sentence.slice(0, wordLimit - wordLen));
            wordLen = wordLimit;
        } else {
            truncated.push([...sentence]);
            wordLen = sentenceEnd;
        }

        if (wordLen === wordLimit) break;
    }

    return truncated;
}
