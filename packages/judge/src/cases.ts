import path from 'path';
import {
    DEFAULT_INPUT_SUFFIX, DEFAULT_OUTPUT_SUFFIX, ProblemConfigFile, readSubtasksFromFiles, Subtask,
} from '@olyverify/common';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import Schema from 'schemastery';
import { FormatError } from './error';
import {
    changeErrorType, collectFiles, ensureFile, isDirectory,
} from './utils';

const ProblemConfig = Schema.object({
    problem: Schema.object({
        score: Schema.number(),
        input_suffix: Schema.string().default(DEFAULT_INPUT_SUFFIX),
        output_suffix: Schema.string().default(DEFAULT_OUTPUT_SUFFIX),
        checker: Schema.string(),
        input_validator: Schema.string(),
    }),
    limits: Schema.object({
        time_secs: Schema.number().min(0).default(1),
    }),
    subtasks: Schema.array(Schema.object({
        id: Schema.number().min(0).step(1),
        regex: Schema.string(),
        score: Schema.number().min(0).step(1),
    })),
    solutions: Schema.array(Schema.object({
        name: Schema.string(),
        min_score: Schema.number(),
        max_score: Schema.number(),
    })),
});

export interface Problem {
    folder: string;
    config: ProblemConfigFile;
    testsDir: string;
    submissionsDir: string;
    /** test paths are absolute */
    subtasks: Subtask[];
    /** absolute paths of inputs without expected output */
    missing: string[];
    checker?: string;
    validator?: string;
    /** milliseconds */
    timeLimit: number;
}

export function parseProblemConfig(content: string): ProblemConfigFile {
    let raw: ReturnType<typeof ProblemConfig>;
    try {
        raw = ProblemConfig(Object.assign({}, yaml.load(content)));
    } catch (e) {
        throw changeErrorType(e, FormatError);
    }
    const problem = raw.problem;
    if (typeof problem?.score !== 'number') throw new FormatError('problem.score is not configured.');
    const subtasks = raw.subtasks || [];
    if (!subtasks.length) throw new FormatError('No subtasks configured.');
    subtasks.forEach((s, i) => {
        if (typeof s.id !== 'number' || typeof s.regex !== 'string' || typeof s.score !== 'number') {
            throw new FormatError('Subtask #{0} needs id, regex and score.', [i + 1]);
        }
        try {
            RegExp(s.regex);
        } catch (e) {
            throw new FormatError('Invalid regex of subtask {0}: {1}', [s.id, s.regex]);
        }
    });
    const solutions = raw.solutions || [];
    solutions.forEach((s, i) => {
        if (typeof s.name !== 'string' || typeof s.min_score !== 'number' || typeof s.max_score !== 'number') {
            throw new FormatError('Solution #{0} needs name, min_score and max_score.', [i + 1]);
        }
    });
    return {
        problem: {
            score: problem.score,
            input_suffix: problem.input_suffix || DEFAULT_INPUT_SUFFIX,
            output_suffix: problem.output_suffix || DEFAULT_OUTPUT_SUFFIX,
            checker: problem.checker || undefined,
            input_validator: problem.input_validator || undefined,
        },
        limits: { time_secs: raw.limits?.time_secs ?? 1 },
        subtasks: subtasks.map((s) => ({ id: s.id, regex: s.regex, score: s.score })),
        solutions: solutions.map((s) => ({ name: s.name, min_score: s.min_score, max_score: s.max_score })),
    };
}

export async function readProblem(folder: string): Promise<Problem> {
    folder = path.resolve(folder);
    if (!await isDirectory(folder)) throw new FormatError('Problem dir not found: {0}', [folder]);
    const configFile = path.join(folder, 'config.yaml');
    if (!await fs.pathExists(configFile)) throw new FormatError('Config file not found: {0}', [configFile]);
    const config = parseProblemConfig(await fs.readFile(configFile, 'utf-8'));
    const testsDir = path.join(folder, 'tests');
    if (!await isDirectory(testsDir)) throw new FormatError("Test dir not found. Please rename test dir to 'tests'.");
    const submissionsDir = path.join(folder, 'submissions');
    if (!await isDirectory(submissionsDir)) throw new FormatError("Submission dir not found. Please rename submission dir to 'submissions'.");
    const checkFile = ensureFile(folder);
    const checker = config.problem.checker
        ? checkFile(path.join('output_checker', config.problem.checker), 'Output checker not found: {0}')
        : undefined;
    const validator = config.problem.input_validator
        ? checkFile(path.join('input_validator', config.problem.input_validator), 'Input validator not found: {0}')
        : undefined;
    const { subtasks, missing } = readSubtasksFromFiles(await collectFiles(testsDir), config.subtasks, config.problem);
    return {
        folder,
        config,
        testsDir,
        submissionsDir,
        subtasks: subtasks.map((s) => ({
            ...s,
            cases: s.cases.map((c) => ({ ...c, input: path.join(testsDir, c.input), output: path.join(testsDir, c.output) })),
        })),
        missing: missing.map((f) => path.join(testsDir, f)),
        checker,
        validator,
        timeLimit: Math.round(config.limits.time_secs * 1000),
    };
}
