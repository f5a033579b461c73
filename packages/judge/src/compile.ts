import path from 'path';
import fs from 'fs-extra';
import { getConfig } from './config';
import { CompileError } from './error';
import { Logger } from './log';
import { runCommand } from './sandbox';
import { compilerText, parseArgs } from './utils';

const logger = new Logger('compile');

export default async function compile(source: string, target: string) {
    const args = parseArgs(getConfig('compile'))
        .map((arg) => arg.replace(/\{source\}/g, source).replace(/\{target\}/g, target));
    await fs.ensureDir(path.dirname(target));
    await fs.remove(target);
    logger.debug('Compiling %s', args.join(' '));
    const timeLimit = getConfig('compile_time_limit');
    const res = await runCommand(args, { time: timeLimit * 1000 });
    if (res.timedOut) throw new CompileError({ stderr: `Compilation did not finish within ${timeLimit}s.` });
    if (res.code !== 0) throw new CompileError({ stdout: res.stdout, stderr: res.stderr, code: res.code });
    if (!await fs.pathExists(target)) throw new CompileError({ stdout: res.stdout, stderr: 'Executable file not found.' });
    if (res.stdout || res.stderr) logger.debug('%s', compilerText(res.stdout, res.stderr));
    return target;
}
