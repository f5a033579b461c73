import type { Subtask, SubtaskConfig, TestCase } from './types';

export const DEFAULT_INPUT_SUFFIX = 'inp';
export const DEFAULT_OUTPUT_SUFFIX = 'out';

export interface SuffixConfig {
    input_suffix?: string;
    output_suffix?: string;
}

export interface ReadSubtasksResult {
    subtasks: Subtask[];
    /** inputs whose expected output does not exist */
    missing: string[];
}

function splitPath(file: string): [string, string] {
    const index = file.lastIndexOf('/');
    return [file.substring(0, index + 1), file.substring(index + 1)];
}

/**
 * Partition test files into subtasks. `files` are relative to the test directory,
 * using `/` as separator. A subtask rule matches from the start of the base name.
 */
export function readSubtasksFromFiles(files: string[], subtasks: SubtaskConfig[], config: SuffixConfig = {}): ReadSubtasksResult {
    const inputSuffix = `.${config.input_suffix || DEFAULT_INPUT_SUFFIX}`;
    const outputSuffix = `.${config.output_suffix || DEFAULT_OUTPUT_SUFFIX}`;
    const available = new Set(files);
    const sorted = [...files].sort();
    const missing = new Set<string>();
    const result = subtasks.map((subtask): Subtask => {
        const rule = new RegExp(`^(?:${subtask.regex})`);
        const cases: TestCase[] = [];
        for (const file of sorted) {
            const [dir, base] = splitPath(file);
            if (base.length <= inputSuffix.length || !base.endsWith(inputSuffix)) continue;
            if (!rule.test(base)) continue;
            const name = base.substring(0, base.length - inputSuffix.length);
            const output = `${dir}${name}${outputSuffix}`;
            if (!available.has(output)) {
                missing.add(file);
                continue;
            }
            cases.push({
                name, input: file, output, subtaskId: subtask.id,
            });
        }
        return {
            id: subtask.id, regex: subtask.regex, score: subtask.score, cases,
        };
    });
    return { subtasks: result, missing: [...missing].sort() };
}

/** Subtask 0 holds the sample data. */
export function isSampleSubtask(subtask: Pick<SubtaskConfig, 'id'>) {
    return subtask.id === 0;
}

export function checkTotalScore(subtasks: Pick<SubtaskConfig, 'score'>[], declared: number) {
    const total = subtasks.reduce((sum, s) => sum + s.score, 0);
    return { total, match: total === declared };
}
