/**
 * List Models Command
 *
 * Prints the model keys accepted by --model and the identifiers they map to.
 */

import { getAllModels } from '@clip-review/review-core';
import { cyan, gray, green, SYMBOLS } from '../logger';
import { EXIT_CODES } from '../exit-codes';
import type { ExitCode } from '../exit-codes';

/**
 * Format the model table, marking the key currently in effect
 */
export function formatModelList(selectedKey: string): string {
    const models = getAllModels();
    const keyWidth = Math.max(...models.map(m => m.key.length));
    const idWidth = Math.max(...models.map(m => m.id.length));

    return models.map(m => {
        const marker = m.key === selectedKey ? green(SYMBOLS.success) : ' ';
        return `${marker} ${cyan(m.key.padEnd(keyWidth))}  ${m.id.padEnd(idWidth)}  ${gray(m.label)}`;
    }).join('\n') + '\n';
}

/**
 * Execute the list-models command
 *
 * @returns exit code
 */
export function executeListModels(
    selectedKey: string,
    write: (text: string) => void = (text) => { process.stdout.write(text); }
): ExitCode {
    write(formatModelList(selectedKey));
    return EXIT_CODES.SUCCESS;
}
