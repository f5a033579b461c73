import path from 'path';
import {
    ProblemVerdict, rejectedVerdicts, SubtaskVerdict, TestVerdict,
} from '@olyverify/common';
import fs from 'fs-extra';
import { Logger } from './log';
import { format, timestamp } from './utils';

export type FindingLevel = 'success' | 'failure' | 'warning';

export interface Finding {
    level: FindingLevel;
    message: string;
    params: unknown[];
}

export interface JudgeLogEntry {
    name: string;
    verdict: ProblemVerdict;
}

const seconds = (ms: number) => (ms / 1000).toFixed(2);

export function formatTestVerdict(test: TestVerdict) {
    return test.time === null ? `${test.verdict} -----` : `${test.verdict} ${seconds(test.time)}s`;
}

/** Measured times in seconds, ascending; only the 4 fastest and 4 slowest past 8 entries. */
export function formatTimes(subtask: Pick<SubtaskVerdict, 'tests'>) {
    const times = subtask.tests
        .map((t) => t.time)
        .filter((t): t is number => t !== null)
        .sort((a, b) => a - b)
        .map(seconds);
    if (times.length <= 8) return times;
    return [...times.slice(0, 4), '...', ...times.slice(-4)];
}

export function formatSubtaskVerdict(subtask: SubtaskVerdict) {
    const rejected = rejectedVerdicts(subtask);
    const verdict = rejected.length ? `{${rejected.join(', ')}}` : 'AC';
    return `${verdict}, score = ${subtask.score.toFixed(2)}`;
}

export function formatJudgeLog(entries: JudgeLogEntry[]) {
    const lines: string[] = [];
    for (const entry of entries) {
        lines.push(`Judge verdict for ${entry.name}`);
        for (const subtask of entry.verdict.subtasks) {
            lines.push(`- Subtask ${subtask.subtaskId}`);
            for (const test of subtask.tests) lines.push(`    ${formatTestVerdict(test)} ${test.input}`);
        }
    }
    return lines.map((l) => `${l}\n`).join('');
}

/** Write the judge log as `<dir>/<timestamp>.log`, never replacing an existing log. */
export async function writeJudgeLog(dir: string, entries: JudgeLogEntry[], date = new Date()) {
    await fs.ensureDir(dir);
    const content = formatJudgeLog(entries);
    const base = timestamp(date);
    for (let i = 0; ; i++) {
        const file = path.join(dir, i ? `${base}_${i}.log` : `${base}.log`);
        try {
            await fs.writeFile(file, content, { flag: 'wx' });
            return file;
        } catch (e) {
            if (!(e instanceof Error && 'code' in e && e.code === 'EEXIST')) throw e;
        }
    }
}

export class Reporter {
    findings: Finding[] = [];

    constructor(private logger = new Logger('verify')) { }

    private add(level: FindingLevel, message: string, params: unknown[]) {
        this.findings.push({ level, message, params });
        const text = format(message, params);
        if (level === 'success') this.logger.success('[✔] %s', text);
        else if (level === 'failure') this.logger.error('[✘] %s', text);
        else this.logger.warn('[!] %s', text);
    }

    success(message: string, ...params: unknown[]) {
        this.add('success', message, params);
    }

    failure(message: string, ...params: unknown[]) {
        this.add('failure', message, params);
    }

    warning(message: string, ...params: unknown[]) {
        this.add('warning', message, params);
    }

    info(message: string, ...params: unknown[]) {
        this.logger.info('%s', format(message, params));
    }

    get failed() {
        return this.findings.some((f) => f.level === 'failure');
    }
}
