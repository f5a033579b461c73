export enum Verdict {
    Accepted = 'AC',
    WrongAnswer = 'WA',
    TimeLimitExceeded = 'TL',
    RuntimeError = 'RE',
}

export const VERDICT_TEXTS: Record<Verdict, string> = {
    [Verdict.Accepted]: 'Accepted',
    [Verdict.WrongAnswer]: 'Wrong Answer',
    [Verdict.TimeLimitExceeded]: 'Time Exceeded',
    [Verdict.RuntimeError]: 'Runtime Error',
};

export const EPS = 1e-6;

export interface TestVerdict {
    verdict: Verdict;
    /** CPU time in milliseconds, `null` when the run was killed by the time limit */
    time: number | null;
    /** base name of the input file */
    input: string;
    subtaskId: number;
}

export interface SubtaskVerdict {
    subtaskId: number;
    fullScore: number;
    tests: TestVerdict[];
    score: number;
}

export interface ProblemVerdict {
    subtasks: SubtaskVerdict[];
    score: number;
}

export function subtaskScore(accepted: number, total: number, fullScore: number) {
    if (!total) return 0;
    return (accepted / total) * fullScore;
}

export function createSubtaskVerdict(subtaskId: number, fullScore: number, tests: TestVerdict[]): SubtaskVerdict {
    const accepted = tests.filter((t) => t.verdict === Verdict.Accepted).length;
    return {
        subtaskId, fullScore, tests, score: subtaskScore(accepted, tests.length, fullScore),
    };
}

export function createProblemVerdict(subtasks: SubtaskVerdict[]): ProblemVerdict {
    return { subtasks, score: subtasks.reduce((sum, s) => sum + s.score, 0) };
}

export function isScoreInRange(score: number, min: number, max: number) {
    return score > min - EPS && score < max + EPS;
}

/** Distinct non-accepted verdicts of a subtask, sorted by short name. */
export function rejectedVerdicts(subtask: Pick<SubtaskVerdict, 'tests'>): Verdict[] {
    const set = new Set(subtask.tests.map((t) => t.verdict).filter((v) => v !== Verdict.Accepted));
    return [...set].sort();
}
