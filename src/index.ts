export { Runner } from './execution/runner';
export { Parser, parseRecipeFile, DEFAULT_SETTINGS } from './core/parser';
export { Lexer, tokenize } from './core/lexer';
export { Evaluator, interpolate } from './core/evaluator';
export { VariableStore } from './core/variable-store';
export { RecipeRegistry } from './core/registry';
export { GraphBuilder } from './core/graph-builder';
export { loadRecipeFile } from './core/loader';
export { ArgumentParser, parseArguments } from './core/arguments';
export { InvocationResolver } from './execution/resolver';
export { Executor, execaSpawner } from './execution/executor';
export { Logger } from './utils/logger';
export * from './errors';

export type { EvaluationContext } from './core/evaluator';
export type { LoadedRecipeFile, LoadOptions } from './core/loader';
export type { ParsedArguments, CliConfig } from './core/arguments';
export type {
  Alias,
  Assignment,
  BodyLine,
  CommandSpawner,
  Condition,
  Config,
  Dependency,
  ExitStatus,
  Expression,
  Invocation,
  Parameter,
  Recipe,
  RecipeFile,
  ResolvedLine,
  RunOptions,
  Settings,
  Shell,
  SpawnRequest,
  Value,
} from './types';
