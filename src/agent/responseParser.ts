/**
 * RESPONSE PARSER
 *
 * Single acceptance function for model answers. Grammar: a method from the
 * closed list, whitespace, then a path token starting with "/". The first
 * such pair wins; prose around it is ignored, including upper-case words
 * that merely look like methods. Never throws.
 */

import { HTTP_METHODS, type HttpMethod } from '../types/dataset.js';

export type ParsedAnswer = { ok: true; method: HttpMethod; path: string };
export type ParseFailure = { ok: false; reason: 'empty' | 'no_match' | 'unsupported_method'; detail?: string };
export type ParseResult = ParsedAnswer | ParseFailure;

const PATH_TOKEN = '(\\/[^\\s`\'"<>]*)';
const REQUEST_RE = new RegExp(`(?:^|[^A-Za-z0-9_])(${HTTP_METHODS.join('|')})\\s+${PATH_TOKEN}`);
// Only consulted when no allowed method matched, to name the offender
const METHOD_LIKE_RE = new RegExp(`(?:^|[^A-Za-z0-9_])([A-Z]+)\\s+${PATH_TOKEN}`);
const TRAILING_PUNCT_RE = /[.,;:!?)\]*"]+$/;

function stripMarkdown(text: string): string {
    return text
        .replace(/```[A-Za-z0-9_-]*/g, '\n')
        .replace(/`/g, ' ')
        .replace(/\*\*/g, ' ');
}

export function normalizePath(path: string): string {
    return path.trim().replace(TRAILING_PUNCT_RE, '').replace(/\/{2,}/g, '/');
}

export function parseResponse(raw: string): ParseResult {
    if (!raw || raw.trim() === '') return { ok: false, reason: 'empty' };
    const lines = stripMarkdown(raw).split(/\r?\n/);
    for (const line of lines) {
        const m = REQUEST_RE.exec(line);
        if (!m) continue;
        const method = HTTP_METHODS.find((h) => h === m[1]);
        const path = normalizePath(m[2] ?? '');
        if (method && path.startsWith('/')) return { ok: true, method, path };
    }
    for (const line of lines) {
        const m = METHOD_LIKE_RE.exec(line);
        if (m) return { ok: false, reason: 'unsupported_method', detail: m[1] };
    }
    return { ok: false, reason: 'no_match' };
}

export function formatAnswer(answer: ParsedAnswer): string {
    return `${answer.method} ${answer.path}`;
}
