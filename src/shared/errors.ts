/**
 * Errors raised by the screenshot diff pipeline. Failed fs calls are not
 * wrapped: they reach the caller as the ErrnoException Node throws.
 */

export type ScreenshotDiffErrorCode =
    | 'PATH_SHAPE'
    | 'TEMPLATE_MISSING'
    | 'CONFIG'
    | 'DUPLICATE_KEY';

export class ScreenshotDiffError extends Error {
    readonly code: ScreenshotDiffErrorCode;

    constructor(code: ScreenshotDiffErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * A discovered file whose path does not reduce to locale/category/name.png
 */
export class PathShapeError extends ScreenshotDiffError {
    readonly path: string;

    constructor(path: string, expected: string) {
        super('PATH_SHAPE', `Path should have ${expected}: ${path}`);
        this.path = path;
    }
}

/**
 * A template or stylesheet missing from the package's templates directory
 */
export class TemplateMissingError extends ScreenshotDiffError {
    readonly assetPath: string;

    constructor(assetPath: string) {
        super('TEMPLATE_MISSING', `Report asset not found: ${assetPath}`);
        this.assetPath = assetPath;
    }
}

export class ConfigError extends ScreenshotDiffError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

/**
 * Two files of one tree reduced to the same key. Reported, never thrown.
 */
export class DuplicateKeyError extends ScreenshotDiffError {
    constructor(key: string, kept: string, dropped: string) {
        super('DUPLICATE_KEY', `Duplicate screenshot key ${key}: keeping ${kept}, ignoring ${dropped}`);
    }
}
