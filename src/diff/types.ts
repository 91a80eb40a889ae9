/**
 * Relative path of a screenshot, `{locale}/{category}/{name}.png`, joined
 * with the platform separator. Identical in the "before" and "after" trees.
 */
export type ScreenshotKey = string;

export interface ScreenshotLabel {
    locale: string;
    category: string;
    /** File name up to its first dot */
    name: string;
}

export interface ScreenshotRecord {
    key: ScreenshotKey;
    absoluteBefore?: string;
    absoluteAfter?: string;
    hashBefore?: string;
    hashAfter?: string;
}

export interface DiffResult {
    onlyInBefore: ScreenshotKey[];
    onlyInAfter: ScreenshotKey[];
    changed: ScreenshotKey[];
    /** Never reported */
    unchanged: ScreenshotKey[];
    records: Map<ScreenshotKey, ScreenshotRecord>;
}

export type ReportMode = 'styled' | 'minimal';

export interface ReportConfig {
    beforeDir: string;
    afterDir: string;
    outputDir: string;
    mode: ReportMode;
}

export interface ReportSummary {
    reportPath: string;
    mode: ReportMode;
    removed: number;
    added: number;
    changed: number;
    unchanged: number;
    copiedFiles: number;
    hasDifferences: boolean;
}
