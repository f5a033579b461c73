import { constants } from 'os';

const descriptions: Record<string, string> = {
    SIGHUP: 'Hangup',
    SIGINT: 'Interrupt',
    SIGQUIT: 'Quit',
    SIGILL: 'Illegal instruction',
    SIGTRAP: 'Trace/breakpoint trap',
    SIGABRT: 'Aborted',
    SIGBUS: 'Bus error',
    SIGFPE: 'Floating point exception',
    SIGKILL: 'Killed',
    SIGSEGV: 'Segmentation fault',
    SIGPIPE: 'Broken pipe',
    SIGALRM: 'Alarm clock',
    SIGTERM: 'Terminated',
    SIGXCPU: 'CPU time limit exceeded',
    SIGXFSZ: 'File size limit exceeded',
};

export function signalName(signal: number): string | null {
    for (const [name, value] of Object.entries(constants.signals)) {
        if (value === signal) return name;
    }
    return null;
}

export function describeSignal(name: string) {
    return descriptions[name] || name;
}
