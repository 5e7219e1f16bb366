/**
 * Engine module exports.
 * This is the main entry point for generation, mod tables and transformation.
 */

// Engine facade and factory
export { TransformationEngine, createTransformationEngine } from './core';
export type { RunOptions, ChunkProgress } from './core';

// Transformation core
export {
  applyStrategy,
  applyBatch,
  invert,
  checkReversibility,
  prepareSelection,
} from './transform';
export type { PreparedSelection, ReversibilityReport } from './transform';

// Base builder
export { generateBase, rowCount, capacityOf, composeIndex, decomposeIndex } from './baseBuilder';

// Registry
export {
  listStrategies,
  resolveStrategy,
  getAvailableStrategyNames,
  getMusicalStrategyNames,
  isStrategyName,
} from './registry';
export type { ModTableStrategy, StrategyDescriptor, ParameterSpec } from './strategies';

// Dimension generators
export {
  createGenerators,
  createChiGenerator,
  createThetaGenerator,
  createLambdaGenerator,
  createEpsilonGenerator,
  epsilonPositionOf,
  lineOfFifthsIndex,
  shiftByFifths,
  MODIFIER_CATALOG,
} from './dimensions';
export type { DimensionGenerator, GeneratorSet } from './dimensions';

// Configuration
export {
  DEFAULT_GENERATOR_CONFIG,
  DEFAULT_ENGINE_OPTIONS,
  resolveGeneratorConfig,
  resolveEngineOptions,
} from './config';
export type { GeneratorConfig, EngineOptions } from './config';

// Errors
export {
  ModTableError,
  InvalidNError,
  DomainOverflowError,
  OutOfDomainError,
  UnknownStrategyError,
  UnknownParameterError,
  InvalidParameterError,
  NotReversibleError,
  InvalidConfigError,
  BatchSelectionError,
  CancelledError,
} from './errors';
export type { ModTableErrorCode } from './errors';

// Dataset and dimension models
export type {
  StrategyName,
  ParamValue,
  ParamInput,
  ResolvedParams,
  Row,
  BaseDataset,
  TransformedRow,
  TransformedDataset,
  Selection,
} from '../types/dataset';
export type {
  DimensionName,
  ChiValue,
  ThetaValue,
  LambdaValue,
  EpsilonValue,
  ModifierTag,
  ModifierCategory,
  RowCoordinates,
  DomainSizes,
} from '../types/dimensions';
