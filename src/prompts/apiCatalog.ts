/**
 * API CATALOG
 *
 * Static endpoint reference shown to the model: method, path template and
 * a short description per endpoint, plus the accepted bar timeframes.
 * Loaded once per process and treated as read-only.
 */

import { z } from 'zod';
import catalogJson from '../data/api-catalog.json' with { type: 'json' };
import { DataError } from '../lib/errors.js';
import { HttpMethodSchema } from '../types/dataset.js';

export const EndpointSchema = z.object({
    method: HttpMethodSchema,
    path: z.string().startsWith('/'),
    description: z.string(),
    params: z.array(z.string()).optional()
});
export type Endpoint = z.infer<typeof EndpointSchema>;

export const ApiCatalogSchema = z.object({
    endpoints: z.array(EndpointSchema).min(1),
    timeframes: z.array(z.string()).default([])
});
export type ApiCatalog = z.infer<typeof ApiCatalogSchema>;

let cached: ApiCatalog | undefined;

export function parseApiCatalog(raw: unknown, source: string): ApiCatalog {
    const parsed = ApiCatalogSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new DataError(`invalid API catalog: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`, source);
    }
    return parsed.data;
}

/** The catalog bundled with the package, validated on first use. */
export function loadApiCatalog(): ApiCatalog {
    cached ??= parseApiCatalog(catalogJson, 'api-catalog.json');
    return cached;
}

export function formatCatalog(catalog: ApiCatalog): string {
    const lines = catalog.endpoints.map((e) => {
        const params = e.params && e.params.length > 0 ? ` (params: ${e.params.join(', ')})` : '';
        return `- ${e.method} ${e.path} - ${e.description}${params}`;
    });
    return lines.join('\n');
}
