import path from 'path';
import fs from 'fs-extra';
import { parse } from 'shell-quote';
import { FormatError, SystemError } from './error';

const EMPTY_STR = /^[ \r\n\t]*$/;

export const cmd = parse;

export function compilerText(...messages: string[]) {
    return messages.filter((i) => !EMPTY_STR.test(i)).map((i) => i.substring(0, 1024 * 1024)).join('\n');
}

/** Replace `{0}`, `{1}`... with the matching parameter. */
export function format(message: string, params: unknown[] = []) {
    return message.replace(/\{(\d+)\}/g, (match, index: string) => {
        const i = +index;
        return i < params.length ? String(params[i]) : match;
    });
}

export function changeErrorType<T extends Error>(err: unknown, Type: new (message: string) => T): T {
    const e = new Type(err instanceof Error ? err.message : String(err));
    if (err instanceof Error && err.stack) e.stack = err.stack;
    return e;
}

export function parseArgs(command: string): string[] {
    const args: string[] = [];
    for (const entry of cmd(command)) {
        if (typeof entry !== 'string') throw new SystemError('Unsupported shell syntax in command: {0}', [command]);
        args.push(entry);
    }
    if (!args.length) throw new SystemError('Empty command.');
    return args;
}

export function ensureFile(folder: string) {
    return (file: string, message: string) => {
        const f = path.join(folder, file);
        if (!fs.existsSync(f) || !fs.statSync(f).isFile()) throw new FormatError(message, [file]);
        return f;
    };
}

/** Files under `dir`, as sorted `/`-separated relative paths. */
export async function collectFiles(dir: string, prefix = ''): Promise<string[]> {
    const result: string[] = [];
    for (const entry of await fs.readdir(path.join(dir, prefix), { withFileTypes: true })) {
        const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
        if (entry.isDirectory()) result.push(...await collectFiles(dir, rel));
        else if (entry.isFile()) result.push(rel);
    }
    return result.sort();
}

export async function isDirectory(p: string) {
    if (!await fs.pathExists(p)) return false;
    return (await fs.stat(p)).isDirectory();
}

const pad = (n: number) => n.toString().padStart(2, '0');

export function timestamp(date = new Date()) {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
