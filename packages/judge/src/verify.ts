import path from 'path';
import {
    checkTotalScore, EPS, isSampleSubtask, isScoreInRange, ProblemVerdict,
} from '@olyverify/common';
import fs from 'fs-extra';
import { Problem, readProblem } from './cases';
import { Checker, getChecker } from './checkers';
import compile from './compile';
import { getConfig } from './config';
import { CompileError, FormatError, SystemError } from './error';
import { judgeExecutable } from './flow';
import {
    Finding, formatSubtaskVerdict, formatTimes, JudgeLogEntry, Reporter, writeJudgeLog,
} from './report';
import { compilerText } from './utils';
import { normalizeLineEndings, validateInput } from './validate';

export interface VerifyReport {
    ok: boolean;
    findings: Finding[];
    verdicts: Record<string, ProblemVerdict>;
    logFile?: string;
}

function reportCompileError(reporter: Reporter, name: string, e: CompileError) {
    reporter.failure('Failed to compile {0}.', name);
    const output = compilerText(e.stdout, e.stderr);
    if (output) reporter.info('Compile output:\n{0}', output);
}

async function verifySubtasks(problem: Problem, validator: string | undefined, reporter: Reporter) {
    const { total, match } = checkTotalScore(problem.subtasks, problem.config.problem.score);
    if (!match) {
        reporter.failure("Total score of all subtasks = {0}, NOT matching problem config's total score = {1}", total, problem.config.problem.score);
    }
    for (const file of problem.missing) reporter.warning('Output file of {0} not found, test skipped.', file);
    let usable = !!validator;
    for (const subtask of problem.subtasks) {
        if (!subtask.cases.length) reporter.failure('Subtask {0} has 0 tests', subtask.id);
        else reporter.success('Subtask {0} has {1} tests', subtask.id, subtask.cases.length);
        if (isSampleSubtask(subtask) || !subtask.cases.length) continue;
        let passed = true;
        for (const c of subtask.cases) {
            if (await normalizeLineEndings(c.input)) reporter.info('Converted CRLF line endings of {0}', c.input);
            if (!validator || !usable) continue;
            try {
                const { pass, message } = await validateInput(validator, subtask.id, c.input);
                if (pass) continue;
                reporter.failure('Test {0} failed input validator', c.input);
                if (message) reporter.info('{0}', message);
            } catch (e) {
                if (!(e instanceof SystemError)) throw e;
                // stop validating, keep judging
                usable = false;
                reporter.failure(e.message, ...e.params);
            }
            passed = false;
        }
        if (validator && usable && passed) reporter.success('Subtask {0} passed input validator.', subtask.id);
    }
}

async function verifySubmissions(problem: Problem, checker: Checker, reporter: Reporter) {
    const verdicts: Record<string, ProblemVerdict> = {};
    const { solutions } = problem.config;
    const { score: fullScore } = problem.config.problem;
    const ext = `.${getConfig('source_ext')}`;
    const configured = new Set(solutions.map((s) => s.name));
    const extra = (await fs.readdir(problem.submissionsDir))
        .filter((f) => f.endsWith(ext) && !configured.has(f))
        .sort();
    if (extra.length) reporter.failure('Found extra submissions (NOT in config.yaml): {0}', extra.join(', '));
    if (!solutions.length) {
        reporter.failure('No solutions found');
        return { verdicts };
    }
    const entries: JudgeLogEntry[] = [];
    const binDir = path.join(getConfig('tmp_dir'), 'bin');
    let acCount = 0;
    for (const solution of solutions) {
        if (solution.min_score > fullScore - EPS) acCount++;
        const source = path.join(problem.submissionsDir, solution.name);
        if (!await fs.pathExists(source)) {
            reporter.failure('Submission {0} not found.', solution.name);
            continue;
        }
        reporter.info('Running {0}', solution.name);
        const dot = solution.name.indexOf('.');
        const target = path.join(binDir, dot > 0 ? solution.name.substring(0, dot) : solution.name);
        try {
            await compile(source, target);
        } catch (e) {
            if (!(e instanceof CompileError)) throw e;
            reportCompileError(reporter, solution.name, e);
            continue;
        }
        const verdict = await judgeExecutable(problem, target, {
            checker,
            onSubtask: (s) => reporter.info(
                '- Subtask {0}, verdict = {1}, times = [{2}]',
                s.subtaskId, formatSubtaskVerdict(s), formatTimes(s).join(', '),
            ),
        });
        verdicts[solution.name] = verdict;
        entries.push({ name: solution.name, verdict });
        const score = verdict.score.toFixed(1);
        if (isScoreInRange(verdict.score, solution.min_score, solution.max_score)) {
            reporter.success('{0} received {1}, in range [{2}, {3}]', solution.name, score, solution.min_score.toFixed(1), solution.max_score.toFixed(1));
        } else if (verdict.score < solution.min_score) {
            reporter.failure('{0} received {1}, min_score = {2}', solution.name, score, solution.min_score.toFixed(1));
        } else {
            reporter.failure('{0} received {1}, max_score = {2}', solution.name, score, solution.max_score.toFixed(1));
        }
    }
    if (acCount <= 1) reporter.failure('Only 0 or 1 AC solution');
    const logFile = await writeJudgeLog(getConfig('log_dir'), entries);
    reporter.success('Printed judge log to {0}', logFile);
    return { verdicts, logFile };
}

async function compileTool(source: string, target: string, reporter: Reporter) {
    try {
        return await compile(source, target);
    } catch (e) {
        if (!(e instanceof CompileError)) throw e;
        reportCompileError(reporter, path.basename(source), e);
        return null;
    }
}

async function prepare(problem: Problem, reporter: Reporter) {
    const tmpDir = getConfig('tmp_dir');
    let validator: string | undefined;
    if (problem.validator) {
        const execute = await compileTool(problem.validator, path.join(tmpDir, 'input_validator'), reporter);
        if (!execute) return null;
        validator = execute;
        reporter.success('Input validator found at {0}', problem.validator);
    } else {
        reporter.warning('No input validator configured, inputs are not validated.');
    }
    let checker: Checker;
    if (problem.checker) {
        const execute = await compileTool(problem.checker, path.join(tmpDir, 'checker'), reporter);
        if (!execute) return null;
        checker = getChecker(execute);
        reporter.success('Found and compiled checker {0}', path.basename(problem.checker));
    } else {
        checker = getChecker();
        reporter.success('No checker required. Using default checker `diff -w`');
    }
    return { validator, checker };
}

export async function verifyProblem(folder: string, reporter = new Reporter()): Promise<VerifyReport> {
    const report = (): VerifyReport => ({ ok: !reporter.failed, findings: reporter.findings, verdicts: {} });
    try {
        const problem = await readProblem(folder);
        reporter.success('Problem dir found at {0}', problem.folder);
        reporter.success('{0} subtasks, scores = [{1}]', problem.subtasks.length, problem.subtasks.map((s) => s.score).join(', '));
        const tools = await prepare(problem, reporter);
        if (!tools) return report();
        await verifySubtasks(problem, tools.validator, reporter);
        const { verdicts, logFile } = await verifySubmissions(problem, tools.checker, reporter);
        return { ...report(), verdicts, logFile };
    } catch (e) {
        if (!(e instanceof FormatError) && !(e instanceof SystemError)) throw e;
        reporter.failure(e.message, ...e.params);
        return report();
    }
}
