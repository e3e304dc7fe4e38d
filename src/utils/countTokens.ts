import { encode } from "gpt-tokenizer";

export const countTokens = (text: string): number => encode(text).length;
