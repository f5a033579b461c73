import path from 'path';
import { Subtask, SubtaskVerdict, Verdict } from '@olyverify/common';
import { expect } from 'chai';
import fs from 'fs-extra';
import { before, describe, it } from 'node:test';
import { getChecker } from '../src/checkers';
import { judgeExecutable, JudgeProblem } from '../src/flow';
import { tmpDir, writeFiles, writeScript } from './fixtures';

const SOLUTION = `read a b
case "$a" in
    loop) sleep 5 ;;
    crash) exit 7 ;;
esac
echo $((a + b))`;

describe('judgeExecutable', () => {
    let dir: string;
    let execute: string;
    let problem: JudgeProblem;

    before(async () => {
        dir = await tmpDir();
        await writeFiles(dir, {
            't1.inp': '1 2\n',
            't1.out': '3\n',
            't2.inp': '2 2\n',
            't2.out': '4\n',
            't3.inp': '5 5\n',
            't3.out': '10\n',
            't4.inp': '1 1\n',
            't4.out': '3\n',
            'loop.inp': 'loop 0\n',
            'loop.out': '0\n',
            'crash.inp': 'crash 0\n',
            'crash.out': '0\n',
        });
        execute = await writeScript(path.join(dir, 'sum.sh'), SOLUTION);
        const test = (name: string, subtaskId: number) => ({
            name, input: path.join(dir, `${name}.inp`), output: path.join(dir, `${name}.out`), subtaskId,
        });
        const subtasks: Subtask[] = [
            {
                id: 1, regex: 't', score: 20, cases: ['t1', 't2', 't3', 't4'].map((n) => test(n, 1)),
            },
            {
                id: 2, regex: '(loop|crash)', score: 30, cases: ['loop', 'crash'].map((n) => test(n, 2)),
            },
            {
                id: 3, regex: 'none', score: 50, cases: [],
            },
        ];
        problem = { testsDir: dir, subtasks, timeLimit: 1000 };
    });

    it('scores subtasks by the fraction of accepted tests', async () => {
        const reported: SubtaskVerdict[] = [];
        const verdict = await judgeExecutable(problem, execute, {
            checker: getChecker(),
            tmpDir: path.join(dir, 'tmp'),
            keepOutputs: false,
            onSubtask: (s) => reported.push(s),
        });
        expect(verdict.score).to.equal(15);
        expect(verdict.subtasks.map((s) => [s.subtaskId, s.score])).to.deep.equal([[1, 15], [2, 0]]);
        expect(reported).to.deep.equal(verdict.subtasks);
        expect(verdict.subtasks[0].tests.map((t) => t.verdict)).to.deep.equal([
            Verdict.Accepted, Verdict.Accepted, Verdict.Accepted, Verdict.WrongAnswer,
        ]);
        const [loop, crash] = verdict.subtasks[1].tests;
        expect(loop).to.deep.equal({
            input: 'loop.inp', subtaskId: 2, verdict: Verdict.TimeLimitExceeded, time: null,
        });
        expect(crash.verdict).to.equal(Verdict.RuntimeError);
        expect(crash.time).to.be.a('number');
    });

    it('uses the given checker', async () => {
        const verdict = await judgeExecutable({ ...problem, subtasks: problem.subtasks.slice(0, 1) }, execute, {
            checker: async () => ({ pass: true, message: '' }),
            tmpDir: path.join(dir, 'tmp'),
            keepOutputs: false,
        });
        expect(verdict.score).to.equal(20);
    });

    it('keeps the output of every test on request', async () => {
        const tmp = path.join(dir, 'kept');
        const first = await judgeExecutable({ ...problem, subtasks: problem.subtasks.slice(0, 1) }, execute, {
            checker: getChecker(),
            tmpDir: tmp,
            keepOutputs: true,
        });
        expect(await fs.readFile(path.join(tmp, 'outputs', 'sum.sh', '1', 't1.out'), 'utf-8')).to.equal('3\n');
        expect(await fs.readFile(path.join(tmp, 'outputs', 'sum.sh', '1', 't4.out'), 'utf-8')).to.equal('2\n');
        const second = await judgeExecutable({ ...problem, subtasks: problem.subtasks.slice(0, 1) }, execute, {
            checker: getChecker(),
            tmpDir: tmp,
            keepOutputs: true,
        });
        expect(second.score).to.equal(first.score);
        expect(second.subtasks[0].tests.map((t) => t.verdict)).to.deep.equal(first.subtasks[0].tests.map((t) => t.verdict));
    });

    it('keeps outputs of same-named tests in different directories apart', async () => {
        await writeFiles(dir, {
            'a/1.inp': '1 1\n',
            'a/1.out': '2\n',
            'b/1.inp': '2 3\n',
            'b/1.out': '5\n',
        });
        const test = (group: string) => ({
            name: '1', input: path.join(dir, group, '1.inp'), output: path.join(dir, group, '1.out'), subtaskId: 4,
        });
        const tmp = path.join(dir, 'nested');
        const verdict = await judgeExecutable({
            testsDir: dir,
            timeLimit: 1000,
            subtasks: [{
                id: 4, regex: '1', score: 10, cases: [test('a'), test('b')],
            }],
        }, execute, { checker: getChecker(), tmpDir: tmp, keepOutputs: true });
        expect(verdict.score).to.equal(10);
        expect(await fs.readFile(path.join(tmp, 'outputs', 'sum.sh', '4', 'a', '1.out'), 'utf-8')).to.equal('2\n');
        expect(await fs.readFile(path.join(tmp, 'outputs', 'sum.sh', '4', 'b', '1.out'), 'utf-8')).to.equal('5\n');
    });
});
