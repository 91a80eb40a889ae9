import { Command, CommanderError } from 'commander';
import { RawReportOptions, REPORT_MODES, resolveConfig } from './diff/config.js';
import { runScreenshotDiff, ScreenshotDiffOptions } from './diff/ScreenshotDiff.js';
import { ErrorHandler, ErrorSeverity } from './shared/utils/index.js';

export interface CliOptions {
    mode?: string;
    minimal?: boolean;
}

/**
 * Map parsed arguments to raw report options. --minimal wins over --mode.
 */
export function toReportOptions(
    beforeDir: string,
    afterDir: string,
    outputDir: string,
    options: CliOptions
): RawReportOptions {
    return {
        beforeDir,
        afterDir,
        outputDir,
        mode: options.minimal ? 'minimal' : options.mode
    };
}

function buildProgram(env: NodeJS.ProcessEnv, onRun: (options: RawReportOptions) => void): Command {
    return new Command()
        .name('screenshot-diff')
        .description('Compare two screenshot directories and write an HTML report of the differences')
        .version('1.0.0')
        .argument('<before_dir>', 'Directory containing screenshots before the proposed changes')
        .argument('<after_dir>', 'Directory containing screenshots after the proposed changes')
        .argument('<output_dir>', 'Directory to save the screenshots diff report')
        .option('--mode <mode>', `Report mode: ${REPORT_MODES.join(' | ')}`, env.SCREENSHOT_DIFF_MODE)
        .option('--minimal', 'Shorthand for --mode minimal', false)
        .exitOverride()
        .action((beforeDir: string, afterDir: string, outputDir: string, options: CliOptions) => {
            onRun(toReportOptions(beforeDir, afterDir, outputDir, options));
        });
}

/**
 * Run the screenshot-diff command on user arguments (no node/script
 * prefix) and return the process exit code.
 */
export function runCli(
    argv: string[],
    env: NodeJS.ProcessEnv = process.env,
    options: ScreenshotDiffOptions = {}
): number {
    let exitCode = 0;

    const program = buildProgram(env, rawOptions => {
        try {
            runScreenshotDiff(resolveConfig(rawOptions), options);
        } catch (error) {
            // Pipeline stages log their own failures as CRITICAL
            if (!ErrorHandler.wasReported(error)) {
                ErrorHandler.handle(error, { component: 'screenshot-diff', operation: 'run' }, ErrorSeverity.ERROR);
            }
            exitCode = 1;
        }
    });

    try {
        program.parse(argv, { from: 'user' });
    } catch (error) {
        // Usage errors, --help and --version; commander has already printed them
        if (error instanceof CommanderError) return error.exitCode;
        throw error;
    }

    return exitCode;
}
