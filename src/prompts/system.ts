/**
 * INSTRUCTION PREAMBLE
 *
 * Fixed opening of every prompt. States the answer grammar the response
 * parser accepts: one line, an HTTP method from the closed list, a space,
 * then a path starting with "/".
 */

import { HTTP_METHODS } from '../types/dataset.js';

export function getInstructionPrompt(): string {
    return (
        '# Trading API Request Translator\n\n' +
        'You are an expert on a broker trading REST API. Translate the user question into the single HTTP request that answers it.\n\n' +
        '## Output format\n\n' +
        '- Reply with exactly one line: METHOD PATH\n' +
        `- METHOD is one of: ${HTTP_METHODS.join(', ')}\n` +
        '- PATH starts with "/" and includes the query string when parameters are needed\n' +
        '- Substitute concrete values for {placeholders} (symbols look like TICKER@MIC, e.g. SBER@MISX)\n' +
        '- No explanations, no markdown, no quotes\n'
    );
}
