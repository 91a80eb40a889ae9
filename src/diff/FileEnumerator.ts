import { FileSystemHelper } from '../shared/utils/index.js';

const SCREENSHOT_PATTERN = /\.png$/;

/**
 * Every .png file at any depth below root, sorted. A root that does not
 * exist has no screenshots.
 */
export function listScreenshots(root: string): string[] {
    return FileSystemHelper.findFilesRecursive(root, SCREENSHOT_PATTERN).sort();
}
