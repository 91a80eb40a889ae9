import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import { DiffEngine, diffFingerprints, hasDifferences } from '../../src/diff/DiffEngine.js';
import { Fingerprinter } from '../../src/diff/Fingerprinter.js';
import { key, makeTempDir, removeDir, writeTree } from '../helpers/screenshotTree.js';

class RecordingFingerprinter extends Fingerprinter {
    readonly hashed: string[] = [];

    hashFile(filePath: string): string {
        this.hashed.push(filePath);
        return super.hashFile(filePath);
    }
}

describe('diffFingerprints', () => {
    it('should put every key in exactly one bucket', () => {
        const before = new Map([
            ['en/c/A.png', 'h1'],
            ['es/c/B.png', 'h2'],
            ['de/c/D.png', 'h4']
        ]);
        const after = new Map([
            ['en/c/A.png', 'h1-changed'],
            ['fr/c/C.png', 'h3'],
            ['de/c/D.png', 'h4']
        ]);

        const result = diffFingerprints(before, after);

        expect(result.onlyInBefore).toEqual(['es/c/B.png']);
        expect(result.onlyInAfter).toEqual(['fr/c/C.png']);
        expect(result.changed).toEqual(['en/c/A.png']);
        expect(result.unchanged).toEqual(['de/c/D.png']);
        expect(result.records.get('en/c/A.png')).toEqual({ key: 'en/c/A.png', hashBefore: 'h1', hashAfter: 'h1-changed' });
        expect(result.records.get('es/c/B.png')).toEqual({ key: 'es/c/B.png', hashBefore: 'h2' });
        expect(result.records.size).toBe(4);
    });

    it('should sort each bucket', () => {
        const result = diffFingerprints(new Map(), new Map([['fr/c/Z.png', '1'], ['en/c/A.png', '2'], ['en/b/A.png', '3']]));

        expect(result.onlyInAfter).toEqual(['en/b/A.png', 'en/c/A.png', 'fr/c/Z.png']);
    });

    it('should report no differences for identical maps', () => {
        const hashes = new Map([['en/c/A.png', 'h1'], ['es/c/B.png', 'h2']]);

        const result = diffFingerprints(hashes, new Map(hashes));

        expect(hasDifferences(result)).toBe(false);
        expect(result.unchanged).toEqual(['en/c/A.png', 'es/c/B.png']);
    });

    it('should report no differences for two empty maps', () => {
        expect(hasDifferences(diffFingerprints(new Map(), new Map()))).toBe(false);
    });
});

describe('DiffEngine', () => {
    let workDir: string;
    let beforeDir: string;
    let afterDir: string;

    beforeEach(() => {
        workDir = makeTempDir();
        beforeDir = path.join(workDir, 'before');
        afterDir = path.join(workDir, 'after');
    });

    afterEach(() => {
        removeDir(workDir);
        vi.restoreAllMocks();
    });

    it('should classify added, removed and changed screenshots', () => {
        writeTree(beforeDir, {
            'en/tools_views/A.png': 'X',
            'es/tools_views/B.png': 'Y'
        });
        writeTree(afterDir, {
            'en/tools_views/A.png': 'X-prime',
            'fr/tools_views/C.png': 'Z'
        });

        const result = new DiffEngine().compareDirectories(beforeDir, afterDir);

        expect(result.onlyInBefore).toEqual([key('es/tools_views/B.png')]);
        expect(result.onlyInAfter).toEqual([key('fr/tools_views/C.png')]);
        expect(result.changed).toEqual([key('en/tools_views/A.png')]);
        expect(result.unchanged).toEqual([]);
        expect(hasDifferences(result)).toBe(true);
    });

    it('should match keys across different root depths', () => {
        writeTree(beforeDir, { 'run-1/shots/en/tools_views/A.png': 'same' });
        writeTree(afterDir, { 'en/tools_views/A.png': 'same' });

        const result = new DiffEngine().compareDirectories(beforeDir, afterDir);

        expect(result.unchanged).toEqual([key('en/tools_views/A.png')]);
        expect(hasDifferences(result)).toBe(false);
    });

    it('should record the absolute path on each side', () => {
        writeTree(beforeDir, { 'en/tools_views/A.png': 'X' });
        writeTree(afterDir, { 'en/tools_views/A.png': 'Y' });

        const record = new DiffEngine().compareDirectories(beforeDir, afterDir).records.get(key('en/tools_views/A.png'));

        expect(record?.absoluteBefore).toBe(path.join(beforeDir, 'en', 'tools_views', 'A.png'));
        expect(record?.absoluteAfter).toBe(path.join(afterDir, 'en', 'tools_views', 'A.png'));
        expect(record?.hashBefore).not.toBe(record?.hashAfter);
    });

    it('should not hash screenshots that only exist after', () => {
        writeTree(beforeDir, {
            'en/tools_views/A.png': 'X',
            'es/tools_views/B.png': 'Y'
        });
        writeTree(afterDir, {
            'en/tools_views/A.png': 'X',
            'fr/tools_views/C.png': 'Z'
        });
        const fingerprinter = new RecordingFingerprinter();

        const result = new DiffEngine(fingerprinter).compareDirectories(beforeDir, afterDir);

        expect(fingerprinter.hashed).toEqual([
            path.join(beforeDir, 'en', 'tools_views', 'A.png'),
            path.join(beforeDir, 'es', 'tools_views', 'B.png'),
            path.join(afterDir, 'en', 'tools_views', 'A.png')
        ]);
        expect(result.records.get(key('fr/tools_views/C.png'))?.hashAfter).toBeUndefined();
        expect(result.unchanged).toEqual([key('en/tools_views/A.png')]);
    });

    it('should treat a missing before directory as empty', () => {
        writeTree(afterDir, { 'en/tools_views/A.png': 'X' });

        const result = new DiffEngine().compareDirectories(path.join(workDir, 'missing'), afterDir);

        expect(result.onlyInAfter).toEqual([key('en/tools_views/A.png')]);
        expect(result.onlyInBefore).toEqual([]);
    });

    it('should keep the later file and warn when two files share a key', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        writeTree(beforeDir, {
            'run-1/en/tools_views/A.png': 'old',
            'run-2/en/tools_views/A.png': 'new'
        });
        writeTree(afterDir, { 'en/tools_views/A.png': 'new' });

        const result = new DiffEngine().compareDirectories(beforeDir, afterDir);

        expect(result.unchanged).toEqual([key('en/tools_views/A.png')]);
        expect(result.records.get(key('en/tools_views/A.png'))?.absoluteBefore)
            .toBe(path.join(beforeDir, 'run-2', 'en', 'tools_views', 'A.png'));
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(expect.stringContaining('Duplicate screenshot key'));
    });
});
