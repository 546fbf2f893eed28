/**
 * Replace action: edit a file in place.
 *
 * Every match of `pattern` (multiline) becomes the replacement. With no
 * match the replacement is appended as a new line. A missing file is
 * created with the replacement when `create_if_missing` is set.
 */
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';

import { compilePattern } from '../config/patterns.js';
import type { ReplaceCommand } from '../config/types.js';
import type { TemplateContext } from '../template/context.js';
import { substituteTemplateVariables } from '../template/substitute.js';

/**
 * What a replace action did.
 */
export type ReplaceOutcome = 'replaced' | 'appended' | 'created';

/**
 * Apply a replacement to file content.
 *
 * @example
 * ```typescript
 * replaceInContent('A=1\nDATABASE_URL=old\n', /DATABASE_URL=.*$/gm, 'DATABASE_URL=new')
 * // { content: 'A=1\nDATABASE_URL=new\n', matched: true }
 * ```
 */
export function replaceInContent(
    content: string,
    pattern: RegExp,
    replacement: string,
): { content: string; matched: boolean } {

    pattern.lastIndex = 0;

    if (!pattern.test(content)) {

        const separator = content === '' || content.endsWith('\n') ? '' : '\n';

        return { content: `${content}${separator}${replacement}\n`, matched: false };

    }

    pattern.lastIndex = 0;

    return { content: content.replace(pattern, replacement), matched: true };

}

/**
 * Run a replace action.
 *
 * @throws Error for an invalid pattern or a missing file without
 *         `create_if_missing`
 */
export function applyReplaceCommand(
    command: ReplaceCommand,
    context: TemplateContext,
    baseDir: string,
): ReplaceOutcome {

    const file = resolve(baseDir, substituteTemplateVariables(command.file, context));
    const replacement = substituteTemplateVariables(command.replacement, context);

    if (!existsSync(file)) {

        if (!command.create_if_missing) {

            throw new Error(`File not found: ${file}`);

        }

        writeFileSync(file, `${replacement}\n`, 'utf8');

        return 'created';

    }

    const regex = compilePattern(command.pattern);

    if (regex instanceof Error) {

        throw new Error(`Invalid pattern "${command.pattern}": ${regex.message}`);

    }

    const global = new RegExp(regex.source, 'gm');
    const result = replaceInContent(readFileSync(file, 'utf8'), global, replacement);

    writeFileSync(file, result.content, 'utf8');

    return result.matched ? 'replaced' : 'appended';

}
