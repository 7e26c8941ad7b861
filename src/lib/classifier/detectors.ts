/**
 * Scalar type detectors for raw text values
 * Evaluated in priority order so looser patterns never shadow stricter ones
 */

import type { DetectorMatch, TypeDetector } from "./types.js";

const NULL_TOKENS = new Set(["null", "none", "n/a"]);

const BOOLEAN_TOKENS: ReadonlyMap<string, boolean> = new Map([
  ["true", true],
  ["false", false],
  ["yes", true],
  ["no", false],
]);

// Also valid integers, so a field decides which reading wins
const AMBIGUOUS_BOOLEAN_TOKENS: ReadonlyMap<string, boolean> = new Map([
  ["1", true],
  ["0", false],
]);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?|\d+[eE][+-]?\d+)$/;
const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
const URL_PATTERN = /^(?:https?:\/\/|www\.)\S+$/i;

interface DatePattern {
  regex: RegExp;
  year: number;
  month: number;
  day: number;
}

// Capture-group positions per supported layout
const DATE_PATTERNS: DatePattern[] = [
  { regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, year: 1, month: 2, day: 3 },
  { regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, year: 1, month: 2, day: 3 },
  { regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, year: 3, month: 2, day: 1 },
  { regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, year: 3, month: 2, day: 1 },
  { regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, year: 3, month: 2, day: 1 },
];

/**
 * Build a canonical YYYY-MM-DD string, or null when the date does not exist
 */
export function canonicalDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  const pad = (n: number, width: number) => String(n).padStart(width, "0");
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

export function parseDate(text: string): string | null {
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.regex.exec(text);
    if (!match) continue;
    const year = Number(match[pattern.year]);
    const month = Number(match[pattern.month]);
    const day = Number(match[pattern.day]);
    return canonicalDate(year, month, day);
  }
  return null;
}

const NULL_DETECTOR: TypeDetector = {
  type: "null",
  priority: 1,
  detect: (text) => (text === "" || NULL_TOKENS.has(text.toLowerCase()) ? { value: null } : null),
};

const BOOLEAN_DETECTOR: TypeDetector = {
  type: "boolean",
  priority: 2,
  detect: (text): DetectorMatch | null => {
    const token = text.toLowerCase();
    const plain = BOOLEAN_TOKENS.get(token);
    if (plain !== undefined) {
      return { value: plain };
    }
    const ambiguous = AMBIGUOUS_BOOLEAN_TOKENS.get(token);
    if (ambiguous !== undefined) {
      return { value: ambiguous, ambiguous: true };
    }
    return null;
  },
};

const INTEGER_DETECTOR: TypeDetector = {
  type: "integer",
  priority: 3,
  detect: (text) => {
    if (!INTEGER_PATTERN.test(text)) return null;
    const value = Number(text);
    // Digit strings past 2^53 lose precision as numbers; leave them to the string fallback
    if (!Number.isSafeInteger(value)) return null;
    return { value: value === 0 ? 0 : value };
  },
};

const FLOAT_DETECTOR: TypeDetector = {
  type: "float",
  priority: 4,
  detect: (text) => {
    if (!FLOAT_PATTERN.test(text)) return null;
    const value = Number(text);
    return Number.isFinite(value) ? { value } : null;
  },
};

const EMAIL_DETECTOR: TypeDetector = {
  type: "email",
  priority: 5,
  detect: (text) => (EMAIL_PATTERN.test(text) ? { value: text.toLowerCase() } : null),
};

const URL_DETECTOR: TypeDetector = {
  type: "url",
  priority: 6,
  detect: (text) => (URL_PATTERN.test(text) ? { value: text } : null),
};

const DATE_DETECTOR: TypeDetector = {
  type: "date",
  priority: 7,
  detect: (text) => {
    const value = parseDate(text);
    return value === null ? null : { value };
  },
};

/**
 * Built-in detectors; anything they all reject is a string
 */
export const BUILTIN_DETECTORS: readonly TypeDetector[] = [
  NULL_DETECTOR,
  BOOLEAN_DETECTOR,
  INTEGER_DETECTOR,
  FLOAT_DETECTOR,
  EMAIL_DETECTOR,
  URL_DETECTOR,
  DATE_DETECTOR,
];
