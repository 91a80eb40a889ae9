import { DuplicateKeyError } from '../shared/errors.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/index.js';
import { listScreenshots } from './FileEnumerator.js';
import { Fingerprinter } from './Fingerprinter.js';
import { toScreenshotKey } from './PathNormalizer.js';
import { DiffResult, ScreenshotKey, ScreenshotRecord } from './types.js';

const byKey = (a: ScreenshotKey, b: ScreenshotKey): number => (a < b ? -1 : a > b ? 1 : 0);

export function hasDifferences(result: DiffResult): boolean {
    return result.onlyInBefore.length > 0
        || result.onlyInAfter.length > 0
        || result.changed.length > 0;
}

/**
 * Classify keys of two key -> digest maps. Every key of either map lands in
 * exactly one bucket.
 */
export function diffFingerprints(
    before: ReadonlyMap<ScreenshotKey, string>,
    after: ReadonlyMap<ScreenshotKey, string>
): DiffResult {
    const result = emptyResult();

    for (const [key, hashAfter] of after) {
        const hashBefore = before.get(key);
        result.records.set(key, { key, hashBefore, hashAfter });

        if (hashBefore === undefined) {
            result.onlyInAfter.push(key);
        } else if (hashBefore !== hashAfter) {
            result.changed.push(key);
        } else {
            result.unchanged.push(key);
        }
    }

    for (const [key, hashBefore] of before) {
        if (!after.has(key)) {
            result.onlyInBefore.push(key);
            result.records.set(key, { key, hashBefore });
        }
    }

    return sortBuckets(result);
}

export class DiffEngine {
    constructor(private readonly fingerprinter: Fingerprinter = new Fingerprinter()) {}

    /**
     * Diff two screenshot trees. Every "before" file is hashed; an "after"
     * file is hashed only when its key also exists before.
     */
    compareDirectories(beforeDir: string, afterDir: string): DiffResult {
        const result = emptyResult();
        const beforeFiles = this.collectKeys(beforeDir);
        const afterFiles = this.collectKeys(afterDir);

        for (const [key, file] of beforeFiles) {
            result.records.set(key, {
                key,
                absoluteBefore: file,
                hashBefore: this.fingerprinter.hashFile(file)
            });
        }

        for (const [key, file] of afterFiles) {
            const record = result.records.get(key);
            if (!record) {
                result.records.set(key, { key, absoluteAfter: file });
                result.onlyInAfter.push(key);
                continue;
            }

            record.absoluteAfter = file;
            record.hashAfter = this.fingerprinter.hashFile(file);
            if (record.hashBefore !== record.hashAfter) {
                result.changed.push(key);
            } else {
                result.unchanged.push(key);
            }
        }

        for (const key of beforeFiles.keys()) {
            if (!afterFiles.has(key)) {
                result.onlyInBefore.push(key);
            }
        }

        return sortBuckets(result);
    }

    /**
     * key -> absolute path for one tree; on a key collision the later file
     * in sorted order wins
     */
    private collectKeys(root: string): Map<ScreenshotKey, string> {
        const files = new Map<ScreenshotKey, string>();

        for (const file of listScreenshots(root)) {
            const key = toScreenshotKey(file);
            const previous = files.get(key);
            if (previous !== undefined) {
                ErrorHandler.handle(
                    new DuplicateKeyError(key, file, previous),
                    { component: 'DiffEngine', operation: 'collectKeys', data: { root } },
                    ErrorSeverity.WARNING
                );
            }
            files.set(key, file);
        }

        return files;
    }
}

function emptyResult(): DiffResult {
    return {
        onlyInBefore: [],
        onlyInAfter: [],
        changed: [],
        unchanged: [],
        records: new Map<ScreenshotKey, ScreenshotRecord>()
    };
}

function sortBuckets(result: DiffResult): DiffResult {
    result.onlyInBefore.sort(byKey);
    result.onlyInAfter.sort(byKey);
    result.changed.sort(byKey);
    result.unchanged.sort(byKey);
    return result;
}
