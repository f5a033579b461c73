import path from 'path';
import {
    createProblemVerdict, createSubtaskVerdict, ProblemVerdict, Subtask, SubtaskVerdict, TestCase, TestVerdict, Verdict,
} from '@olyverify/common';
import fs from 'fs-extra';
import type { Checker } from './checkers';
import { getConfig } from './config';
import { Logger } from './log';
import { runProgram } from './sandbox';
import { describeSignal } from './signals';

const logger = new Logger('judge');

export interface JudgeOptions {
    checker: Checker;
    /** defaults to the `tmp_dir` setting */
    tmpDir?: string;
    /** defaults to the `keep_outputs` setting */
    keepOutputs?: boolean;
    onSubtask?: (verdict: SubtaskVerdict) => void;
}

export interface JudgeProblem {
    /** directory the test paths are relative to, mirrored by kept outputs */
    testsDir: string;
    subtasks: Subtask[];
    /** milliseconds */
    timeLimit: number;
}

async function judgeCase(c: TestCase, execute: string, timeLimit: number, output: string, checker: Checker): Promise<TestVerdict> {
    const base = {
        input: path.basename(c.input),
        subtaskId: c.subtaskId,
    };
    const res = await runProgram(execute, c.input, output, timeLimit);
    switch (res.kind) {
        case 'timeout':
            return { ...base, verdict: Verdict.TimeLimitExceeded, time: null };
        case 'runtime_error':
            logger.debug('%s: exited with %s', c.name, res.signal ? describeSignal(res.signal) : res.code);
            return { ...base, verdict: Verdict.RuntimeError, time: res.time };
        case 'completed': {
            const { pass, message } = await checker({ input: c.input, output: c.output, user_stdout: output });
            if (!pass && message) logger.debug('%s: %s', c.name, message);
            return { ...base, verdict: pass ? Verdict.Accepted : Verdict.WrongAnswer, time: res.time };
        }
    }
}

/** Judge one executable against every test of every subtask, one test at a time. */
export async function judgeExecutable(problem: JudgeProblem, execute: string, options: JudgeOptions): Promise<ProblemVerdict> {
    const tmpDir = options.tmpDir ?? getConfig('tmp_dir');
    const keepOutputs = options.keepOutputs ?? getConfig('keep_outputs');
    const outputDir = keepOutputs ? path.join(tmpDir, 'outputs', path.basename(execute)) : tmpDir;
    await fs.ensureDir(outputDir);
    const results: SubtaskVerdict[] = [];
    for (const subtask of problem.subtasks) {
        if (!subtask.cases.length) continue;
        const tests: TestVerdict[] = [];
        for (const c of subtask.cases) {
            let output = path.join(outputDir, 'user.out');
            if (keepOutputs) {
                const dir = path.join(outputDir, subtask.id.toString(), path.relative(problem.testsDir, path.dirname(c.input)));
                await fs.ensureDir(dir);
                output = path.join(dir, `${c.name}.out`);
            }
            tests.push(await judgeCase(c, execute, problem.timeLimit, output, options.checker));
        }
        const verdict = createSubtaskVerdict(subtask.id, subtask.score, tests);
        options.onSubtask?.(verdict);
        results.push(verdict);
    }
    return createProblemVerdict(results);
}
