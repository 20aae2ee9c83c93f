/**
 * @fileoverview Message tokenizer shared by the model families
 *
 * @module models/tokenize
 */

const TOKEN_PATTERN = /[a-z0-9']+/g;

/**
 * Lower-cased word tokens, in message order, duplicates kept.
 */
export function tokenize(message: string): string[] {
    return message.toLowerCase().match(TOKEN_PATTERN) ?? [];
}
