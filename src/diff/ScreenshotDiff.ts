import { ErrorHandler } from '../shared/utils/index.js';
import { DiffEngine } from './DiffEngine.js';
import { ReportRenderer, ReportRendererOptions } from './ReportRenderer.js';
import { ReportConfig, ReportSummary } from './types.js';

export interface ScreenshotDiffOptions extends ReportRendererOptions {
    engine?: DiffEngine;
}

/**
 * Diff the before/after screenshot trees of config and write the report.
 * Failures are logged with their stage and propagate unchanged.
 */
export function runScreenshotDiff(config: ReportConfig, options: ScreenshotDiffOptions = {}): ReportSummary {
    const engine = options.engine ?? new DiffEngine();

    console.log(`[ScreenshotDiff] Before: ${config.beforeDir}`);
    console.log(`[ScreenshotDiff] After:  ${config.afterDir}`);

    const diff = ErrorHandler.runCritical(
        () => engine.compareDirectories(config.beforeDir, config.afterDir),
        { component: 'ScreenshotDiff', operation: 'compare', data: { beforeDir: config.beforeDir, afterDir: config.afterDir } }
    );

    const renderer = new ReportRenderer(config, { templatesDir: options.templatesDir });
    const summary = ErrorHandler.runCritical(
        () => renderer.render(diff),
        { component: 'ScreenshotDiff', operation: 'render', data: { outputDir: config.outputDir, mode: config.mode } }
    );

    console.log(
        `[ScreenshotDiff] Removed: ${summary.removed}, Added: ${summary.added}, ` +
        `Changed: ${summary.changed}, Unchanged: ${summary.unchanged}`
    );
    console.log(`[ScreenshotDiff] Report: ${summary.reportPath}`);

    return summary;
}
