export { runScreenshotDiff, type ScreenshotDiffOptions } from './diff/ScreenshotDiff.js';
export { DiffEngine, diffFingerprints, hasDifferences } from './diff/DiffEngine.js';
export { Fingerprinter } from './diff/Fingerprinter.js';
export { listScreenshots } from './diff/FileEnumerator.js';
export { toScreenshotKey, parseScreenshotKey, keyToUrlPath } from './diff/PathNormalizer.js';
export {
    ReportRenderer,
    renderFragment,
    renderNoDifferences,
    type ReportRendererOptions
} from './diff/ReportRenderer.js';
export { resolveConfig, REPORT_MODES, DEFAULT_MODE } from './diff/config.js';
export type {
    DiffResult,
    ReportConfig,
    ReportMode,
    ReportSummary,
    ScreenshotKey,
    ScreenshotLabel,
    ScreenshotRecord
} from './diff/types.js';
export {
    ScreenshotDiffError,
    PathShapeError,
    TemplateMissingError,
    ConfigError,
    DuplicateKeyError
} from './shared/errors.js';
