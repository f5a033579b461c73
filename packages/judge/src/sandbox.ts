import { spawn } from 'child_process';
import { Readable } from 'stream';
import fs from 'fs-extra';
import { SystemError } from './error';
import { Logger } from './log';
import { signalName } from './signals';

const logger = new Logger('sandbox');

export type RunOutcome =
    | { kind: 'completed', time: number }
    | { kind: 'runtime_error', time: number, code: number | null, signal: string | null }
    | { kind: 'timeout' };

export interface CommandOptions {
    /** file fed as standard input */
    stdin?: string;
    /** wall-clock bound in milliseconds */
    time?: number;
    cwd?: string;
}

export interface CommandResult {
    code: number | null;
    signal: string | null;
    timedOut: boolean;
    stdout: string;
    stderr: string;
}

// `times` prints the shell's own usage, then the usage of its terminated children.
// fd 3 carries the report and is closed for the program itself.
const WRAPPER = '"$@" 3>&-; code=$?; times >&3; exit $code';
const TIMES_RE = /(\d+)m(\d+(?:[.,]\d+)?)s/g;

/** Children CPU time (user + system) in milliseconds from the output of `times`. */
export function parseTimes(output: string): number | null {
    const lines = output.trim().split('\n');
    if (lines.length < 2) return null;
    const values = [...lines[1].matchAll(TIMES_RE)].map((m) => (+m[1] * 60 + +m[2].replace(',', '.')) * 1000);
    if (values.length !== 2) return null;
    return Math.round(values[0] + values[1]);
}

function killGroup(pid: number | undefined) {
    if (!pid) return;
    try {
        process.kill(-pid, 'SIGKILL');
    } catch (e) {
        logger.debug('Process group %d already gone: %s', pid, e instanceof Error ? e.message : e);
    }
}

async function openInput(file?: string) {
    if (!file) return null;
    try {
        return await fs.open(file, 'r');
    } catch (e) {
        throw new SystemError('Cannot open input {0}: {1}', [file, e instanceof Error ? e.message : e]);
    }
}

/**
 * Run `execute` with `input` as standard input and store its standard output in `output`.
 * The whole process group is killed once `timeLimit` milliseconds of wall-clock time have passed.
 */
export async function runProgram(execute: string, input: string, output: string, timeLimit: number): Promise<RunOutcome> {
    const stdin = await openInput(input);
    try {
        return await new Promise<RunOutcome>((resolve, reject) => {
            const child = spawn('/bin/bash', ['-c', WRAPPER, 'runner', execute], {
                stdio: [stdin ?? 'ignore', 'pipe', 'ignore', 'pipe'],
                detached: true,
            });
            const stdout: Buffer[] = [];
            let usage = '';
            let timedOut = false;
            let failed = false;
            child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
            const report = child.stdio[3];
            if (report instanceof Readable) {
                report.on('data', (chunk: Buffer) => {
                    usage += chunk.toString();
                });
            }
            const timer = setTimeout(() => {
                timedOut = true;
                killGroup(child.pid);
            }, timeLimit);
            child.on('error', (e) => {
                failed = true;
                clearTimeout(timer);
                reject(new SystemError('Cannot start {0}: {1}', [execute, e.message]));
            });
            child.on('close', (code, signal) => {
                clearTimeout(timer);
                if (failed) return;
                if (timedOut) {
                    resolve({ kind: 'timeout' });
                    return;
                }
                let time = parseTimes(usage);
                if (time === null) {
                    logger.warn('No CPU usage reported for %s', execute);
                    time = 0;
                }
                let outcome: RunOutcome;
                if (code === 0) outcome = { kind: 'completed', time };
                else if (code !== null && code > 128) {
                    outcome = {
                        kind: 'runtime_error', time, code, signal: signalName(code - 128),
                    };
                } else {
                    outcome = {
                        kind: 'runtime_error', time, code, signal,
                    };
                }
                fs.writeFile(output, Buffer.concat(stdout)).then(() => resolve(outcome), reject);
            });
        });
    } finally {
        if (stdin !== null) await fs.close(stdin);
    }
}

/** Run a helper program (checker, validator, compiler) and collect its output. */
export async function runCommand(args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const stdin = await openInput(options.stdin);
    try {
        return await new Promise<CommandResult>((resolve, reject) => {
            const child = spawn(args[0], args.slice(1), {
                stdio: [stdin ?? 'ignore', 'pipe', 'pipe'],
                cwd: options.cwd,
                detached: true,
            });
            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            let timedOut = false;
            let failed = false;
            child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
            child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));
            const timer = options.time
                ? setTimeout(() => {
                    timedOut = true;
                    killGroup(child.pid);
                }, options.time)
                : null;
            child.on('error', (e) => {
                failed = true;
                if (timer) clearTimeout(timer);
                reject(new SystemError('Cannot run {0}: {1}', [args[0], e.message]));
            });
            child.on('close', (code, signal) => {
                if (timer) clearTimeout(timer);
                if (failed) return;
                resolve({
                    code,
                    signal,
                    timedOut,
                    stdout: Buffer.concat(stdout).toString(),
                    stderr: Buffer.concat(stderr).toString(),
                });
            });
        });
    } finally {
        if (stdin !== null) await fs.close(stdin);
    }
}
