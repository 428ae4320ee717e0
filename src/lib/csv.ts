/**
 * Semicolon-delimited tables as used by the train/test/submission files.
 * Fields may be double-quoted; a quote inside a quoted field is doubled.
 */

import { promises as fs } from 'fs';
import path from 'node:path';

export const DELIMITER = ';';

export type CsvRecord = {
    /** 1-based line number of the record in the source file */
    line: number;
    values: Record<string, string>;
};

export type CsvTable = {
    header: string[];
    records: CsvRecord[];
};

export function parseCsv(text: string, delimiter = DELIMITER): CsvTable {
    const rows = splitRows(text.replace(/^\uFEFF/, ''), delimiter);
    const first = rows.shift();
    if (!first) return { header: [], records: [] };
    const header = first.fields.map((h) => h.trim());
    const records: CsvRecord[] = [];
    for (const row of rows) {
        if (row.fields.length === 1 && row.fields[0] === '') continue;
        const values: Record<string, string> = {};
        header.forEach((name, i) => {
            values[name] = row.fields[i] ?? '';
        });
        records.push({ line: row.line, values });
    }
    return { header, records };
}

function splitRows(text: string, delimiter: string): Array<{ line: number; fields: string[] }> {
    const out: Array<{ line: number; fields: string[] }> = [];
    let fields: string[] = [];
    let field = '';
    let quoted = false;
    let line = 1;
    let rowLine = 1;
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (quoted) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    quoted = false;
                }
            } else {
                if (ch === '\n') line++;
                field += ch;
            }
            continue;
        }
        if (ch === '"' && field === '') {
            quoted = true;
        } else if (ch === delimiter) {
            fields.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            fields.push(field);
            out.push({ line: rowLine, fields });
            fields = [];
            field = '';
            line++;
            rowLine = line;
        } else {
            field += ch;
        }
    }
    if (field !== '' || fields.length > 0) {
        fields.push(field);
        out.push({ line: rowLine, fields });
    }
    return out;
}

function quote(value: string, delimiter: string): string {
    if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function formatCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>, delimiter = DELIMITER): string {
    const lines = [header, ...rows].map((r) => r.map((v) => quote(v, delimiter)).join(delimiter));
    return lines.join('\n') + '\n';
}

export async function readCsvFile(filePath: string, delimiter = DELIMITER): Promise<CsvTable> {
    const text = await fs.readFile(filePath, 'utf8');
    return parseCsv(text, delimiter);
}

/** Writes to a sibling temp file and renames it over the target. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
    try {
        await fs.writeFile(tmp, content, 'utf8');
        await fs.rename(tmp, filePath);
    } catch (e) {
        await fs.rm(tmp, { force: true });
        throw e;
    }
}
