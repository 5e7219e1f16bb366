import { Midi } from '@tonejs/midi';
import type { Row, TransformedDataset } from '../types/dataset';
import type { EpsilonValue } from '../types/dimensions';
import { NATURAL_PITCH_CLASS } from '../engine/dimensions/theta';

export interface MidiExportOptions {
  /** Playback tempo in quarter notes per minute */
  bpm: number;
}

export const DEFAULT_MIDI_EXPORT_OPTIONS: MidiExportOptions = {
  bpm: 120,
};

/** Velocity used when a row carries no dynamic level */
export const DEFAULT_VELOCITY = 0.7;

/**
 * Normalized velocity for each dynamic level in the modifier catalog.
 * Hairpins and niente describe motion rather than a level and are not listed.
 */
const DYNAMIC_VELOCITY: Readonly<Record<string, number | undefined>> = {
  pianississimo: 0.15,
  pianissimo: 0.25,
  piano: 0.4,
  'mezzo-piano': 0.5,
  'mezzo-forte': 0.6,
  forte: 0.75,
  fortepiano: 0.75,
  fortissimo: 0.85,
  fortississimo: 0.95,
  sforzando: 1.0,
};

/**
 * MIDI note number for a row: 12 * (octave + 1) + natural letter + alteration.
 * The register follows the letter, so B♯ sits above B♮ and C♭ below C♮.
 */
export function midiNoteNumber(row: Row): number {
  return 12 * (row.lambda.octave + 1) + NATURAL_PITCH_CLASS[row.theta.letter] + row.theta.alter;
}

/**
 * Velocity of the loudest dynamic in an Epsilon subset.
 */
export function velocityOf(epsilon: EpsilonValue): number {
  const levels = epsilon.modifiers
    .map((modifier) => DYNAMIC_VELOCITY[modifier.id])
    .filter((level): level is number => level !== undefined);
  return levels.length > 0 ? Math.max(...levels) : DEFAULT_VELOCITY;
}

/**
 * Renders a dataset as a single-track Standard MIDI File.
 * One note per row, played back to back; Chi beats give each note's length.
 *
 * @returns Raw .mid bytes
 */
export function datasetToMidi(
  dataset: TransformedDataset,
  options: Partial<MidiExportOptions> = {}
): Uint8Array {
  const { bpm } = { ...DEFAULT_MIDI_EXPORT_OPTIONS, ...options };

  const midi = new Midi();
  midi.header.setTempo(bpm);
  midi.header.name = `${dataset.strategy} N=${dataset.n}`;

  const ppq = midi.header.ppq;
  const track = midi.addTrack();
  track.name = dataset.strategy;

  let ticks = 0;
  for (const row of dataset.rows) {
    const durationTicks = Math.max(1, Math.round(row.chi.beats * ppq));
    track.addNote({
      midi: midiNoteNumber(row),
      ticks,
      durationTicks,
      velocity: velocityOf(row.epsilon),
    });
    ticks += durationTicks;
  }

  return midi.toArray();
}
