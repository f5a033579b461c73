import path from 'path';
import {
    createProblemVerdict, createSubtaskVerdict, TestVerdict, Verdict,
} from '@olyverify/common';
import { expect } from 'chai';
import fs from 'fs-extra';
import { describe, it } from 'node:test';
import {
    formatJudgeLog, formatSubtaskVerdict, formatTestVerdict, formatTimes, Reporter, writeJudgeLog,
} from '../src/report';
import { tmpDir } from './fixtures';

function test(verdict: Verdict, time: number | null, input = 'a.inp', subtaskId = 1): TestVerdict {
    return {
        verdict, time, input, subtaskId,
    };
}

describe('verdict formatting', () => {
    it('prints test verdicts', () => {
        expect(formatTestVerdict(test(Verdict.Accepted, 120))).to.equal('AC 0.12s');
        expect(formatTestVerdict(test(Verdict.RuntimeError, 3))).to.equal('RE 0.00s');
        expect(formatTestVerdict(test(Verdict.TimeLimitExceeded, null))).to.equal('TL -----');
    });

    it('prints subtask verdicts', () => {
        const partial = createSubtaskVerdict(1, 20, [
            test(Verdict.WrongAnswer, 10), test(Verdict.Accepted, 10), test(Verdict.RuntimeError, 10), test(Verdict.WrongAnswer, 10),
        ]);
        expect(formatSubtaskVerdict(partial)).to.equal('{RE, WA}, score = 5.00');
        const full = createSubtaskVerdict(2, 20, [test(Verdict.Accepted, 10)]);
        expect(formatSubtaskVerdict(full)).to.equal('AC, score = 20.00');
    });

    it('shortens long time lists', () => {
        const tests = [100, 90, 80, 70, 60, 50, 40, 30, 20, 10].map((t) => test(Verdict.Accepted, t));
        tests.push(test(Verdict.TimeLimitExceeded, null));
        expect(formatTimes({ tests })).to.deep.equal(['0.01', '0.02', '0.03', '0.04', '...', '0.07', '0.08', '0.09', '0.10']);
        expect(formatTimes({ tests: tests.slice(0, 2) })).to.deep.equal(['0.09', '0.10']);
    });

    it('writes the judge log', () => {
        const verdict = createProblemVerdict([
            createSubtaskVerdict(0, 0, [test(Verdict.Accepted, 10, 'sample.inp', 0)]),
            createSubtaskVerdict(1, 100, [test(Verdict.TimeLimitExceeded, null, 'big.inp')]),
        ]);
        expect(formatJudgeLog([{ name: 'main.cpp', verdict }])).to.equal([
            'Judge verdict for main.cpp',
            '- Subtask 0',
            '    AC 0.01s sample.inp',
            '- Subtask 1',
            '    TL ----- big.inp',
            '',
        ].join('\n'));
    });
});

describe('writeJudgeLog', () => {
    it('never replaces a log written in the same second', async () => {
        const dir = await tmpDir();
        const date = new Date(2024, 0, 2, 3, 4, 5);
        const verdict = createProblemVerdict([createSubtaskVerdict(1, 100, [test(Verdict.Accepted, 10)])]);
        const first = await writeJudgeLog(dir, [{ name: 'first.cpp', verdict }], date);
        const second = await writeJudgeLog(dir, [{ name: 'second.cpp', verdict }], date);
        expect(first).to.equal(path.join(dir, '20240102_030405.log'));
        expect(second).to.equal(path.join(dir, '20240102_030405_1.log'));
        expect((await fs.readFile(first, 'utf-8')).split('\n')[0]).to.equal('Judge verdict for first.cpp');
        expect((await fs.readFile(second, 'utf-8')).split('\n')[0]).to.equal('Judge verdict for second.cpp');
    });
});

describe('Reporter', () => {
    it('collects findings', () => {
        const reporter = new Reporter();
        reporter.success('Subtask {0} has {1} tests', 1, 3);
        expect(reporter.failed).to.equal(false);
        reporter.warning('Output file of {0} not found, test skipped.', 'a.inp');
        expect(reporter.failed).to.equal(false);
        reporter.failure('Only 0 or 1 AC solution');
        expect(reporter.failed).to.equal(true);
        expect(reporter.findings.map((f) => f.level)).to.deep.equal(['success', 'warning', 'failure']);
        expect(reporter.findings[0]).to.deep.equal({ level: 'success', message: 'Subtask {0} has {1} tests', params: [1, 3] });
    });
});
