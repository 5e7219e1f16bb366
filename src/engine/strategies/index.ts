/**
 * Strategies module - Exports all mod table implementations and types.
 */

// Types
export type {
  ModTableStrategy,
  StrategyDescriptor,
  ParameterSpec,
  IntegerParameterSpec,
  OptionParameterSpec,
  RowAnnotations,
} from './types';

export { resolveParams, readInteger, readOption, mod } from './params';

// Uniform tables
export { createDefaultStrategy, createIncrementStrategy } from './offsetTables';
export { createCustomStrategy } from './customTable';

// Musical tables
export { createChromaticStrategy, CHROMATIC_INTERVALS, INTERVAL_FIFTHS } from './chromaticTable';
export type { ChromaticInterval } from './chromaticTable';
export { createRhythmicStrategy, RHYTHMIC_MODES } from './rhythmicTable';
export type { RhythmicMode } from './rhythmicTable';
export { createHarmonicStrategy, CHORD_QUALITIES, CHORD_TONES } from './harmonicTable';
export type { ChordQuality, ChordTone } from './harmonicTable';
export { createModalStrategy, modalInflection, MODES } from './modalTable';
export type { Mode } from './modalTable';
export { createOctaveStrategy, OCTAVE_OPERATIONS } from './octaveTable';
export type { OctaveOperation } from './octaveTable';
