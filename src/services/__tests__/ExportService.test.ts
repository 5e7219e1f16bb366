import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { generateBase } from '../../engine/baseBuilder';
import { applyStrategy } from '../../engine/transform';
import { ExportService, isExportFormat } from '../ExportService';

const SMALL = { chiDomainSize: 4, epsilonCatalogSize: 3 };

describe('ExportService', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), 'mod-tables-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
  });

  it('should write JSON and MIDI files named after the run', async () => {
    const service = new ExportService({ outputDir });
    const dataset = applyStrategy(generateBase(4, SMALL), 'chromatic', { interval: 'fourth' });

    const written = await service.exportDataset(dataset, 'both');

    expect(written.map((file) => path.basename(file))).toEqual([
      'transformed_N4_chromatic_interval-fourth.json',
      'transformed_N4_chromatic_interval-fourth.mid',
    ]);
    const midiBytes = await readFile(written[1]);
    expect(midiBytes.subarray(0, 4).toString('ascii')).toBe('MThd');
  });

  it('should create missing output directories', async () => {
    const nested = path.join(outputDir, 'runs', 'first');
    const service = new ExportService();
    const dataset = applyStrategy(generateBase(2, SMALL), 'default');

    const [file] = await service.exportDataset(dataset, 'json', { outputDir: nested });

    expect(path.dirname(file)).toBe(nested);
  });

  it('should read back what it wrote', async () => {
    const service = new ExportService({ outputDir });
    const dataset = applyStrategy(generateBase(6, SMALL), 'modal', { mode: 'dorian', tonic: 'D' });

    const file = await service.writeJson(dataset);
    const loaded = await service.readJson(file);

    expect(loaded.id).toBe(dataset.id);
    expect(loaded.rows).toEqual(dataset.rows);
  });

  it('should export batches in order and log each file', async () => {
    const service = new ExportService({ outputDir });
    const base = generateBase(3, SMALL);

    const written = await service.exportAll(
      [applyStrategy(base, 'octave'), applyStrategy(base, 'custom')],
      'json'
    );

    expect(written.map((file) => path.basename(file))).toEqual([
      'transformed_N3_octave_operation-up_steps-1.json',
      'transformed_N3_custom_exponent-2.json',
    ]);
    expect(console.log).toHaveBeenCalledWith(`[ExportService] Wrote ${written[0]}`);
  });

  it('should list JSON exports by name and ignore other files', async () => {
    const service = new ExportService({ outputDir });
    const base = generateBase(2, SMALL);
    await service.exportDataset(applyStrategy(base, 'octave'), 'both');
    await service.exportDataset(applyStrategy(base, 'default'), 'json');

    const listed = await service.listExports();

    expect(listed.map((file) => path.basename(file))).toEqual([
      'transformed_N2_default_step-1.json',
      'transformed_N2_octave_operation-up_steps-1.json',
    ]);
    expect(await service.listExports(path.join(outputDir, 'missing'))).toEqual([]);
  });

  it('should recognise export formats', () => {
    expect(isExportFormat('midi')).toBe(true);
    expect(isExportFormat('wav')).toBe(false);
  });
});
