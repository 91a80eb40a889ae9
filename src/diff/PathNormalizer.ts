import * as path from 'path';
import { PathShapeError } from '../shared/errors.js';
import { ScreenshotKey, ScreenshotLabel } from './types.js';

export const KEY_SEGMENTS = 3;

function segmentsOf(filePath: string): string[] {
    return filePath.split(path.sep).filter(segment => segment.length > 0);
}

/**
 * Reduce a screenshot path to its last three segments:
 *     /ci/before/run-12/en/tools_views/ToolsCalcFinalWordDoneView.png
 *  -> en/tools_views/ToolsCalcFinalWordDoneView.png
 *
 * These keys are the same in the "before" and "after" directories.
 */
export function toScreenshotKey(filePath: string): ScreenshotKey {
    const parts = segmentsOf(filePath);
    if (parts.length < KEY_SEGMENTS) {
        throw new PathShapeError(filePath, `at least ${KEY_SEGMENTS} parts`);
    }
    return parts.slice(-KEY_SEGMENTS).join(path.sep);
}

/**
 * Split a key into the parts shown in report labels. Stricter than
 * toScreenshotKey: the key must have exactly three segments.
 */
export function parseScreenshotKey(key: ScreenshotKey): ScreenshotLabel {
    const parts = segmentsOf(key);
    if (parts.length !== KEY_SEGMENTS) {
        throw new PathShapeError(key, `${KEY_SEGMENTS} parts`);
    }
    const [locale, category, fileName] = parts;
    return { locale, category, name: fileName.split('.')[0] };
}

/**
 * Key as a relative URL, for img src attributes. Each segment is
 * percent-encoded so '#', '?' and spaces stay part of the path.
 */
export function keyToUrlPath(key: ScreenshotKey): string {
    return segmentsOf(key).map(encodeURIComponent).join('/');
}
