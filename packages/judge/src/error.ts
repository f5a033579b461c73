interface CompileErrorInfo {
    stdout?: string;
    stderr?: string;
    code?: number | null;
}

export class CompileError extends Error {
    stdout: string;
    stderr: string;
    code: number | null;
    type = 'CompileError';

    constructor(obj: string | CompileErrorInfo) {
        super('Compile Error');
        if (typeof obj === 'string') {
            this.stdout = obj;
            this.stderr = '';
            this.code = null;
        } else {
            this.stdout = obj.stdout || '';
            this.stderr = obj.stderr || '';
            this.code = obj.code ?? null;
        }
    }
}

export class FormatError extends Error {
    type = 'FormatError';

    constructor(message: string, public params: unknown[] = []) {
        super(message);
    }
}

export class SystemError extends Error {
    type = 'SystemError';

    constructor(message: string, public params: unknown[] = []) {
        super(message);
    }
}
