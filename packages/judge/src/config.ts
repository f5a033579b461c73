import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import Schema from 'schemastery';
import { FormatError } from './error';
import { changeErrorType } from './utils';

export const JudgeSettings = Schema.object({
    tmp_dir: Schema.string().default(path.resolve(os.tmpdir(), 'olyverify')).description('Executables and program outputs'),
    log_dir: Schema.string().default(path.resolve('logs')).description('Judge log directory'),
    compile: Schema.string().default('g++ {source} -std=c++14 -O2 -I testlib -o {target}').description('Compile command'),
    compile_time_limit: Schema.number().default(60).min(1).description('Seconds'),
    checker_time_limit: Schema.number().default(30).min(1).description('Seconds, for checker and validator runs'),
    source_ext: Schema.string().default('cpp'),
    keep_outputs: Schema.boolean().default(false).description('Keep the output of every test'),
});

export type JudgeSettingsType = ReturnType<typeof JudgeSettings>;

let config = JudgeSettings({});

export interface SettingsOptions {
    config?: string;
    tmp?: string;
    logs?: string;
    keepOutputs?: boolean;
}

/** Settings file first, then environment, then command line flags. */
export async function loadSettings(options: SettingsOptions = {}) {
    const base: Partial<JudgeSettingsType> = {};
    const file = options.config || process.env.OLYVERIFY_CONFIG;
    if (file) {
        const p = path.resolve(file);
        if (!await fs.pathExists(p)) throw new FormatError('Settings file not found: {0}', [p]);
        try {
            Object.assign(base, yaml.load(await fs.readFile(p, 'utf-8')));
        } catch (e) {
            throw changeErrorType(e, FormatError);
        }
    }
    const tmp = options.tmp || process.env.TEMP_DIR;
    if (tmp) base.tmp_dir = path.resolve(tmp);
    const logs = options.logs || process.env.LOG_DIR;
    if (logs) base.log_dir = path.resolve(logs);
    if (options.keepOutputs) base.keep_outputs = true;
    overrideConfig(base);
    return config;
}

export function overrideConfig(update: Partial<JudgeSettingsType>) {
    try {
        config = JudgeSettings({ ...config, ...update });
    } catch (e) {
        throw changeErrorType(e, FormatError);
    }
}

export const getConfig = <K extends keyof JudgeSettingsType>(key: K): JudgeSettingsType[K] => config[key];
