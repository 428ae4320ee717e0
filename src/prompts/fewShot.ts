/**
 * FEW-SHOT PROMPT BUILDER
 *
 * Assembles instruction preamble, API catalog, timeframes, labeled examples
 * and the target question into one prompt. Pure: equal inputs give
 * byte-identical output. Oversized prompts are rejected, never truncated.
 */

import { PromptTooLargeError } from '../lib/errors.js';
import type { Example } from '../types/dataset.js';
import { formatCatalog, type ApiCatalog } from './apiCatalog.js';
import { getInstructionPrompt } from './system.js';

export type PromptBuilderOptions = {
    catalog: ApiCatalog;
    maxChars: number;
};

function oneLine(text: string): string {
    return text.replace(/\s*\r?\n\s*/g, ' ').trim();
}

export function formatExample(ex: Example): string {
    return `Question: "${oneLine(ex.question)}"\nAnswer: ${ex.method} ${ex.path}\n`;
}

export class PromptBuilder {
    private readonly header: string;

    constructor(private readonly opts: PromptBuilderOptions) {
        const timeframes = opts.catalog.timeframes.length > 0
            ? `\n## Timeframes\n\n${opts.catalog.timeframes.join(', ')}\n`
            : '';
        this.header = `${getInstructionPrompt()}\n## API reference\n\n${formatCatalog(opts.catalog)}\n${timeframes}`;
    }

    build(examples: readonly Example[], question: string): string {
        const shots = examples.map(formatExample).join('\n');
        const prompt =
            this.header +
            '\n## Examples\n\n' +
            (shots ? `${shots}\n` : '') +
            `Question: "${oneLine(question)}"\n` +
            'Answer:';
        if (prompt.length > this.opts.maxChars) throw new PromptTooLargeError(prompt.length, this.opts.maxChars);
        return prompt;
    }
}
