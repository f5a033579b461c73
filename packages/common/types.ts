export interface SubtaskConfig {
    id: number;
    regex: string;
    score: number;
}

export interface SolutionConfig {
    name: string;
    min_score: number;
    max_score: number;
}

export interface ProblemConfigFile {
    problem: {
        score: number;
        input_suffix: string;
        output_suffix: string;
        checker?: string;
        input_validator?: string;
    };
    limits: {
        time_secs: number;
    };
    subtasks: SubtaskConfig[];
    solutions: SolutionConfig[];
}

export interface TestCase {
    /** file name with the input suffix stripped */
    name: string;
    input: string;
    output: string;
    subtaskId: number;
}

export interface Subtask extends SubtaskConfig {
    cases: TestCase[];
}
