import cac from 'cac';
import { loadSettings } from './config';
import log, { setVerbose } from './log';
import { verifyProblem } from './verify';

interface CliOptions {
    config?: string;
    tmp?: string;
    logs?: string;
    keepOutputs?: boolean;
    verbose?: boolean;
}

const cli = cac('olyverify');

cli.command('<dir>', 'Verify a problem package')
    .option('--config <file>', 'Settings file (YAML)')
    .option('--tmp <dir>', 'Directory for executables and outputs')
    .option('--logs <dir>', 'Directory for judge logs')
    .option('--keep-outputs', 'Keep the output of every test')
    .option('-v, --verbose', 'Print debug output')
    .action(async (dir: string, options: CliOptions) => {
        setVerbose(!!options.verbose);
        await loadSettings(options);
        const report = await verifyProblem(dir);
        const failures = report.findings.filter((f) => f.level === 'failure').length;
        if (report.ok) log.success('Problem package verified.');
        else log.error('Verification failed with %d problem(s).', failures);
        process.exitCode = report.ok ? 0 : 1;
    });

cli.help();

export async function main(argv = process.argv) {
    cli.parse(argv, { run: false });
    if (!cli.matchedCommand) {
        if (!cli.options.help) cli.outputHelp();
        process.exitCode = cli.options.help ? 0 : 1;
        return;
    }
    await cli.runMatchedCommand();
}

if (require.main === module) {
    main().catch((e) => {
        log.error(e);
        process.exitCode = 1;
    });
}
