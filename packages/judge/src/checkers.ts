import fs from 'fs-extra';
import { getConfig } from './config';
import { SystemError } from './error';
import { runCommand } from './sandbox';
import { format } from './utils';

export interface CheckConfig {
    input: string;
    /** expected output */
    output: string;
    user_stdout: string;
}

export interface CheckResult {
    pass: boolean;
    message: string;
}

export type Checker = (config: CheckConfig) => Promise<CheckResult>;

// diff -w: whitespace inside a line never matters
const WHITESPACE = /[ \t\r\v\f]/g;

function splitLines(content: string) {
    const lines = content.split('\n');
    if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
    return lines;
}

function clip(s: string) {
    s = s.trim();
    return s.length > 20 ? `${s.substring(0, 16)}...` : s;
}

export function compareOutput(usr: string, std: string): CheckResult {
    const u = splitLines(usr);
    const s = splitLines(std);
    for (let i = 0; i < Math.max(u.length, s.length); i++) {
        if (i >= u.length) return { pass: false, message: 'Standard answer longer than user output.' };
        if (i >= s.length) return { pass: false, message: 'User output longer than standard answer.' };
        if (u[i].replace(WHITESPACE, '') === s[i].replace(WHITESPACE, '')) continue;
        return { pass: false, message: format('On line {0}: Read {1}, expect {2}.', [i + 1, clip(u[i]), clip(s[i])]) };
    }
    return { pass: true, message: '' };
}

// latin1: one character per byte
const defaultChecker: Checker = async (config) => compareOutput(
    (await fs.readFile(config.user_stdout)).toString('latin1'),
    (await fs.readFile(config.output)).toString('latin1'),
);

/** `checker <input> <user_out> <answer>`, accepted on exit code 0. */
export function externalChecker(execute: string): Checker {
    return async (config) => {
        const timeLimit = getConfig('checker_time_limit');
        const res = await runCommand([execute, config.input, config.user_stdout, config.output], { time: timeLimit * 1000 });
        if (res.timedOut) throw new SystemError('Checker {0} did not finish within {1}s.', [execute, timeLimit]);
        if (res.code === 0) return { pass: true, message: '' };
        return { pass: false, message: `Checker exited with ${res.code ?? res.signal}` };
    };
}

export function getChecker(execute?: string): Checker {
    return execute ? externalChecker(execute) : defaultChecker;
}
