import os from 'os';
import path from 'path';
import fs from 'fs-extra';

export function tmpDir() {
    return fs.mkdtemp(path.join(os.tmpdir(), 'olyverify-test-'));
}

/** Write an executable shell script. */
export async function writeScript(file: string, body: string) {
    await fs.outputFile(file, `#!/bin/sh\n${body}\n`);
    await fs.chmod(file, 0o755);
    return file;
}

export async function writeFiles(dir: string, files: Record<string, string>) {
    for (const [name, content] of Object.entries(files)) await fs.outputFile(path.join(dir, name), content);
}
