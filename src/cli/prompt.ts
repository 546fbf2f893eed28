/**
 * Terminal prompts.
 *
 * Both prompts answer null when stdin is not a terminal, so hooks and CI
 * runs never block on input.
 */
import { createInterface } from 'node:readline/promises'
import { Writable } from 'node:stream'

import type { PasswordPrompter } from '../core/index.js'


/**
 * Ask a question and resolve the trimmed answer.
 *
 * @example
 * ```typescript
 * const branch = await ask('Branch to switch to: ')
 * ```
 */
export async function ask(question: string): Promise<string | null> {

    if (!process.stdin.isTTY) {

        return null
    }

    const rl = createInterface({ input: process.stdin, output: process.stderr })

    try {

        const answer = await rl.question(question)

        return answer.trim() || null
    }
    finally {

        rl.close()
    }
}


/**
 * Read a password without echoing it.
 *
 * Keystrokes go to a muted copy of stderr while the answer is typed.
 */
export const promptPassword: PasswordPrompter = async (message) => {

    if (!process.stdin.isTTY) {

        return null
    }

    let muted = false

    const output = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            if (!muted) {

                process.stderr.write(chunk)
            }

            callback()
        },
    })

    const rl = createInterface({ input: process.stdin, output, terminal: true })

    try {

        process.stderr.write(message)
        muted = true

        const answer = await rl.question('')

        return answer || null
    }
    finally {

        muted = false
        process.stderr.write('\n')
        rl.close()
    }
}
