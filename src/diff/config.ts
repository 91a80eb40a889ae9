import * as path from 'path';
import { ConfigError } from '../shared/errors.js';
import { ReportConfig, ReportMode } from './types.js';

export const REPORT_MODES: readonly ReportMode[] = ['styled', 'minimal'];

export const DEFAULT_MODE: ReportMode = 'styled';

export interface RawReportOptions {
    beforeDir: string;
    afterDir: string;
    outputDir: string;
    mode?: string;
}

export function isReportMode(value: string): value is ReportMode {
    return REPORT_MODES.some(mode => mode === value);
}

/**
 * Validate CLI input into the config every pipeline stage receives.
 * Directories are resolved against the working directory.
 */
export function resolveConfig(options: RawReportOptions): ReportConfig {
    const mode = options.mode ?? DEFAULT_MODE;
    if (!isReportMode(mode)) {
        throw new ConfigError(`Unknown report mode "${mode}" (expected ${REPORT_MODES.join(' | ')})`);
    }

    for (const [name, value] of Object.entries({
        beforeDir: options.beforeDir,
        afterDir: options.afterDir,
        outputDir: options.outputDir
    })) {
        if (value.trim() === '') {
            throw new ConfigError(`${name} must not be empty`);
        }
    }

    return {
        beforeDir: path.resolve(options.beforeDir),
        afterDir: path.resolve(options.afterDir),
        outputDir: path.resolve(options.outputDir),
        mode
    };
}
