import * as path from 'path';
import { fileURLToPath } from 'url';
import Handlebars from 'handlebars';
import { TemplateMissingError } from '../shared/errors.js';
import { FileSystemHelper } from '../shared/utils/index.js';
import { hasDifferences } from './DiffEngine.js';
import { keyToUrlPath, parseScreenshotKey } from './PathNormalizer.js';
import { DiffResult, ReportConfig, ReportMode, ReportSummary, ScreenshotKey } from './types.js';

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

interface ModeAssets {
    template: string;
    page: string;
    stylesheet?: string;
}

export const MODE_ASSETS: Record<ReportMode, ModeAssets> = {
    styled: { template: 'index.hbs', page: 'index.html', stylesheet: 'report.css' },
    minimal: { template: 'diffs.hbs', page: 'diffs.html' }
};

export type FragmentKind = 'removed' | 'added' | 'changed';

const escapeHtml = Handlebars.escapeExpression;

function img(side: 'before' | 'after', key: ScreenshotKey): string {
    return `<img src="${escapeHtml(`${side}/${keyToUrlPath(key)}`)}">`;
}

/**
 * One <p> block of the report
 */
export function renderFragment(mode: ReportMode, kind: FragmentKind, key: ScreenshotKey): string {
    const { locale, name } = parseScreenshotKey(key);
    const images = kind === 'removed'
        ? img('before', key)
        : kind === 'added'
            ? img('after', key)
            : `${img('before', key)}&nbsp;${img('after', key)}`;
    const label = kind === 'changed' ? escapeHtml(name) : `${kind.toUpperCase()} ${escapeHtml(name)}`;

    if (mode === 'minimal') {
        return `<p>${label}<br>${images}</p>`;
    }
    return `<p><h2>${escapeHtml(locale.toUpperCase())}: ${label}</h2>${images}</p>`;
}

export function renderNoDifferences(mode: ReportMode): string {
    return mode === 'minimal'
        ? '<p>No differences found</p>'
        : '<h1>No differences found</h1>';
}

export interface ReportRendererOptions {
    /** Directory holding the page templates and stylesheet */
    templatesDir?: string;
}

/**
 * ReportRenderer
 * Copies the screenshots behind every reported difference into
 * <output>/before and <output>/after and writes the HTML page.
 */
export class ReportRenderer {
    private readonly templatesDir: string;
    private readonly assets: ModeAssets;

    constructor(private readonly config: ReportConfig, options: ReportRendererOptions = {}) {
        this.templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
        this.assets = MODE_ASSETS[config.mode];
    }

    render(diff: DiffResult): ReportSummary {
        const template = this.loadTemplate();
        const { mode, outputDir } = this.config;
        const outputBefore = path.join(outputDir, 'before');
        const outputAfter = path.join(outputDir, 'after');
        FileSystemHelper.ensureDir(outputBefore);
        FileSystemHelper.ensureDir(outputAfter);

        const fragments: string[] = [];
        let copiedFiles = 0;

        for (const key of diff.onlyInBefore) {
            console.log(`[ReportRenderer] Screenshot only in before: ${key} | ${outputBefore}`);
            FileSystemHelper.copyFile(this.sourceOf(diff, key, 'before'), path.join(outputBefore, key));
            copiedFiles++;
            fragments.push(renderFragment(mode, 'removed', key));
        }

        for (const key of diff.onlyInAfter) {
            console.log(`[ReportRenderer] Screenshot only in after: ${key} | ${outputAfter}`);
            FileSystemHelper.copyFile(this.sourceOf(diff, key, 'after'), path.join(outputAfter, key));
            copiedFiles++;
            fragments.push(renderFragment(mode, 'added', key));
        }

        for (const key of diff.changed) {
            console.log(`[ReportRenderer] Screenshot different: ${key}`);
            FileSystemHelper.copyFile(this.sourceOf(diff, key, 'before'), path.join(outputBefore, key));
            FileSystemHelper.copyFile(this.sourceOf(diff, key, 'after'), path.join(outputAfter, key));
            copiedFiles += 2;
            fragments.push(renderFragment(mode, 'changed', key));
        }

        const differences = hasDifferences(diff);
        if (!differences) {
            console.log('[ReportRenderer] No differences found');
            fragments.push(renderNoDifferences(mode));
        }

        const reportPath = path.join(outputDir, this.assets.page);
        FileSystemHelper.writeText(reportPath, template({ content: fragments.join('') }));

        if (this.assets.stylesheet) {
            FileSystemHelper.copyFile(
                this.assetPath(this.assets.stylesheet),
                path.join(outputDir, this.assets.stylesheet)
            );
        }

        return {
            reportPath,
            mode,
            removed: diff.onlyInBefore.length,
            added: diff.onlyInAfter.length,
            changed: diff.changed.length,
            unchanged: diff.unchanged.length,
            copiedFiles,
            hasDifferences: differences
        };
    }

    /**
     * Compile the page template. Both the template and the stylesheet are
     * checked before anything is copied.
     */
    private loadTemplate() {
        const templatePath = this.assetPath(this.assets.template);
        if (this.assets.stylesheet) {
            this.assetPath(this.assets.stylesheet);
        }
        return Handlebars.compile<{ content: string }>(FileSystemHelper.readText(templatePath));
    }

    private assetPath(fileName: string): string {
        const assetPath = path.join(this.templatesDir, fileName);
        if (!FileSystemHelper.isFile(assetPath)) {
            throw new TemplateMissingError(assetPath);
        }
        return assetPath;
    }

    private sourceOf(diff: DiffResult, key: ScreenshotKey, side: 'before' | 'after'): string {
        const record = diff.records.get(key);
        const recorded = side === 'before' ? record?.absoluteBefore : record?.absoluteAfter;
        return recorded ?? path.join(side === 'before' ? this.config.beforeDir : this.config.afterDir, key);
    }
}
