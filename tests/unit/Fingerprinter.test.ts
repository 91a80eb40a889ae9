import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

vi.mock('fs', async () => {
    const actual = await vi.importActual<typeof import('fs')>('fs');
    return {
        ...actual,
        readSync: vi.fn(actual.readSync),
        closeSync: vi.fn(actual.closeSync)
    };
});

import { Fingerprinter } from '../../src/diff/Fingerprinter.js';
import { makeTempDir, removeDir } from '../helpers/screenshotTree.js';

describe('Fingerprinter', () => {
    let dir: string;
    const fingerprinter = new Fingerprinter();

    beforeEach(() => {
        vi.clearAllMocks();
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('should return the hex sha256 digest of the file', () => {
        const file = path.join(dir, 'abc.png');
        fs.writeFileSync(file, 'abc');

        expect(fingerprinter.hashFile(file)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should hash an empty file', () => {
        const file = path.join(dir, 'empty.png');
        fs.writeFileSync(file, '');

        expect(fingerprinter.hashFile(file)).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should read files larger than one chunk in several reads', () => {
        const content = Buffer.alloc(Fingerprinter.CHUNK_SIZE * 2 + 100, 7);
        const file = path.join(dir, 'large.png');
        fs.writeFileSync(file, content);

        const expected = crypto.createHash('sha256').update(content).digest('hex');

        expect(fingerprinter.hashFile(file)).toBe(expected);
        // two full chunks, the 100-byte tail, then the 0-byte read at EOF
        expect(fs.readSync).toHaveBeenCalledTimes(4);
        expect(fs.closeSync).toHaveBeenCalledTimes(1);
    });

    it('should give different digests for one differing byte', () => {
        const first = path.join(dir, 'first.png');
        const second = path.join(dir, 'second.png');
        fs.writeFileSync(first, Buffer.from([1, 2, 3, 4]));
        fs.writeFileSync(second, Buffer.from([1, 2, 3, 5]));

        expect(fingerprinter.hashFile(first)).not.toBe(fingerprinter.hashFile(second));
    });

    it('should close the file when a read fails', () => {
        const file = path.join(dir, 'broken.png');
        fs.writeFileSync(file, 'data');
        vi.mocked(fs.readSync).mockImplementationOnce(() => {
            throw new Error('EIO: i/o error, read');
        });

        expect(() => fingerprinter.hashFile(file)).toThrow('EIO: i/o error, read');
        expect(fs.closeSync).toHaveBeenCalledTimes(1);
    });

    it('should propagate ENOENT for a missing file', () => {
        let caught: unknown;
        try {
            fingerprinter.hashFile(path.join(dir, 'missing.png'));
        } catch (error) {
            caught = error;
        }
        expect(caught).toMatchObject({ code: 'ENOENT' });
        expect(fs.closeSync).not.toHaveBeenCalled();
    });

    it('should support another algorithm', () => {
        const file = path.join(dir, 'abc.png');
        fs.writeFileSync(file, 'abc');

        expect(new Fingerprinter('sha512').hashFile(file)).toBe(
            crypto.createHash('sha512').update('abc').digest('hex')
        );
    });
});
