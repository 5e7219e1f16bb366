import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { TransformedDataset } from '../types/dataset';
import { buildExportFileName, exportDatasetToJson, parseTransformedDatasetJson } from '../utils/datasetExport';
import { datasetToMidi } from '../utils/midiExport';

export type ExportFormat = 'json' | 'midi' | 'both';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'midi', 'both'];

export interface ExportOptions {
    /** Directory receiving exported files; created when missing */
    outputDir: string;
    /** Tempo for MIDI renders */
    bpm: number;
}

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
    outputDir: 'output',
    bpm: 120,
};

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

export class ExportService {
    private readonly options: ExportOptions;

    constructor(options: Partial<ExportOptions> = {}) {
        this.options = { ...DEFAULT_EXPORT_OPTIONS, ...options };
    }

    private async writeFileInto(outputDir: string, fileName: string, contents: string | Uint8Array): Promise<string> {
        await mkdir(outputDir, { recursive: true });
        const filePath = path.join(outputDir, fileName);
        await writeFile(filePath, contents);
        console.log(`[ExportService] Wrote ${filePath}`);
        return filePath;
    }

    /**
     * Writes the dataset as a JSON document. Returns the file path.
     */
    async writeJson(dataset: TransformedDataset, overrides: Partial<ExportOptions> = {}): Promise<string> {
        const { outputDir } = { ...this.options, ...overrides };
        return this.writeFileInto(outputDir, buildExportFileName(dataset, 'json'), exportDatasetToJson(dataset));
    }

    /**
     * Writes the dataset as a Standard MIDI File. Returns the file path.
     */
    async writeMidi(dataset: TransformedDataset, overrides: Partial<ExportOptions> = {}): Promise<string> {
        const { outputDir, bpm } = { ...this.options, ...overrides };
        return this.writeFileInto(outputDir, buildExportFileName(dataset, 'mid'), datasetToMidi(dataset, { bpm }));
    }

    async exportDataset(
        dataset: TransformedDataset,
        format: ExportFormat,
        overrides: Partial<ExportOptions> = {}
    ): Promise<string[]> {
        const written: string[] = [];
        if (format === 'json' || format === 'both') {
            written.push(await this.writeJson(dataset, overrides));
        }
        if (format === 'midi' || format === 'both') {
            written.push(await this.writeMidi(dataset, overrides));
        }
        return written;
    }

    /**
     * Exports datasets one after another, in order.
     */
    async exportAll(
        datasets: readonly TransformedDataset[],
        format: ExportFormat,
        overrides: Partial<ExportOptions> = {}
    ): Promise<string[]> {
        const written: string[] = [];
        for (const dataset of datasets) {
            written.push(...(await this.exportDataset(dataset, format, overrides)));
        }
        return written;
    }

    /**
     * Lists the JSON exports in a directory, sorted by name. A missing directory has none.
     */
    async listExports(outputDir: string = this.options.outputDir): Promise<string[]> {
        let entries: string[];
        try {
            entries = await readdir(outputDir);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }
        return entries
            .filter((entry) => entry.endsWith('.json'))
            .sort()
            .map((entry) => path.join(outputDir, entry));
    }

    /**
     * Loads a dataset previously written by writeJson.
     */
    async readJson(filePath: string): Promise<TransformedDataset> {
        const json = await readFile(filePath, 'utf8');
        return parseTransformedDatasetJson(json);
    }
}

export const exportService = new ExportService();
