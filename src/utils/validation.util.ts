import { Language } from "../entities/submission.entity";
import { HttpError } from "./error.util";

export const MAX_CODE_BYTES = 50000;

export interface CodeInput {
    code: string;
    language: Language;
}

const isLanguage = (value: string): value is Language =>
    Object.values(Language).some((language) => language === value);

export const parseLanguage = (value: unknown): Language => {
    const upper = typeof value === "string" ? value.toUpperCase() : "";
    if (!isLanguage(upper)) {
        throw new HttpError(400, `Unsupported language. Use one of: ${Object.values(Language).join(", ")}`);
    }
    return upper;
};

/**
 * Rejects empty or oversized code and unknown languages before anything is persisted.
 */
export const validateCodeInput = (code: unknown, language: unknown): CodeInput => {
    if (typeof code !== "string" || code.trim().length === 0) {
        throw new HttpError(400, "Code cannot be empty");
    }
    if (Buffer.byteLength(code, "utf8") > MAX_CODE_BYTES) {
        throw new HttpError(400, `Code exceeds ${MAX_CODE_BYTES} bytes`);
    }
    return { code, language: parseLanguage(language) };
};

export const requireString = (value: unknown, field: string): string => {
    if (typeof value !== "string" || value.trim().length === 0) {
        throw new HttpError(400, `${field} is required`);
    }
    return value;
};
