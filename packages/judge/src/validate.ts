import fs from 'fs-extra';
import { getConfig } from './config';
import { SystemError } from './error';
import { runCommand } from './sandbox';

/** Rewrite CRLF line endings in place. Returns whether the file changed. */
export async function normalizeLineEndings(file: string) {
    const content = (await fs.readFile(file)).toString('latin1');
    if (!content.includes('\r\n')) return false;
    await fs.writeFile(file, Buffer.from(content.replace(/\r\n/g, '\n'), 'latin1'));
    return true;
}

/** `validator <subtask id> <input>` with the input on stdin as well. */
export async function validateInput(execute: string, subtaskId: number, input: string) {
    const timeLimit = getConfig('checker_time_limit');
    const res = await runCommand([execute, subtaskId.toString(), input], { stdin: input, time: timeLimit * 1000 });
    if (res.timedOut) throw new SystemError('Validator did not finish within {0}s on {1}.', [timeLimit, input]);
    return { pass: res.code === 0, message: res.stdout.trim() };
}
