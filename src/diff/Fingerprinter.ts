import * as crypto from 'crypto';
import * as fs from 'fs';

/**
 * Fingerprinter
 * Content digest of a screenshot. Two files are treated as identical
 * iff their digests match; there is no fuzzy comparison.
 */
export class Fingerprinter {
    static readonly CHUNK_SIZE = 8192;

    constructor(private readonly algorithm: string = 'sha256') {}

    /**
     * Hash the file in CHUNK_SIZE reads through one descriptor, closed on
     * every path out
     */
    hashFile(filePath: string): string {
        const hash = crypto.createHash(this.algorithm);
        const buffer = Buffer.alloc(Fingerprinter.CHUNK_SIZE);
        const fd = fs.openSync(filePath, 'r');

        try {
            let bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
            while (bytesRead > 0) {
                hash.update(buffer.subarray(0, bytesRead));
                bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
            }
        } finally {
            fs.closeSync(fd);
        }

        return hash.digest('hex');
    }
}
