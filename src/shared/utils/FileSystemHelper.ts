/**
 * File System Helper
 *
 * Centralized file system operations for the report pipeline. Every
 * operation throws the underlying fs error; nothing here retries.
 */

import * as fs from 'fs';
import * as path from 'path';

export class FileSystemHelper {
    /**
     * Ensure a directory exists, creating it if necessary
     */
    static ensureDir(dirPath: string): void {
        if (fs.existsSync(dirPath)) return;
        fs.mkdirSync(dirPath, { recursive: true });
    }

    /**
     * Ensure the parent directory of a file exists
     */
    static ensureDirForFile(filePath: string): void {
        this.ensureDir(path.dirname(filePath));
    }

    /**
     * Copy a file, creating the destination's parent directories and
     * overwriting any previous copy
     */
    static copyFile(src: string, dest: string): void {
        this.ensureDirForFile(dest);
        fs.copyFileSync(src, dest);
    }

    static readText(filePath: string): string {
        return fs.readFileSync(filePath, 'utf-8');
    }

    static writeText(filePath: string, content: string): void {
        this.ensureDirForFile(filePath);
        fs.writeFileSync(filePath, content);
    }

    /**
     * Check if path is a file
     */
    static isFile(filePath: string): boolean {
        return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
    }

    /**
     * Find files recursively whose name matches the pattern. Symlinks are
     * followed; a link whose target is gone is skipped, and a directory link
     * back to one of its own ancestors is not descended. A missing root
     * yields no files; an unreadable directory throws.
     */
    static findFilesRecursive(dirPath: string, pattern: RegExp): string[] {
        const results: string[] = [];
        const ancestors = new Set<string>();

        const search = (currentPath: string): void => {
            const realPath = fs.realpathSync(currentPath);
            if (ancestors.has(realPath)) return;
            ancestors.add(realPath);

            const entries = fs.readdirSync(currentPath, { withFileTypes: true });
            for (const entry of entries) {
                const fullPath = path.join(currentPath, entry.name);
                const target = entry.isSymbolicLink()
                    ? fs.statSync(fullPath, { throwIfNoEntry: false })
                    : entry;
                if (!target) continue;

                if (target.isDirectory()) {
                    search(fullPath);
                } else if (target.isFile() && pattern.test(entry.name)) {
                    results.push(fullPath);
                }
            }

            ancestors.delete(realPath);
        };

        if (!fs.existsSync(dirPath)) return results;
        search(dirPath);
        return results;
    }
}

export default FileSystemHelper;
