/**
 * Symbolic policy interpreter.
 *
 * Runs a policy over a route record. A guard that depends on symbolic
 * attributes forks execution; each resulting path carries the guard
 * decisions it took (its condition), the record it produced, and a trace.
 *
 * @module interpreter/interpreter
 */

import {
  and,
  bool,
  isLiteral,
  or,
  type AttributeName,
  type Disposition,
  type Expr,
  type Policy,
  type Statement,
} from '../compiler/ast.js';
import { partialEvaluate, type EvaluationEnv } from '../compiler/evaluator.js';
import { negate, simplify } from '../compiler/simplifier.js';
import { CondenserError, InterpretError } from '../core/errors.js';
import type { RouteRecord } from './route-record.js';

export const DEFAULT_MAX_PATHS = 1024;

export interface TraceStep {
  policy: string;
  /** Statement location, e.g. `1.true.0`; `end` for the implicit default. */
  statement: string;
  action: 'branch' | 'assign' | 'return' | 'default';
  branch?: boolean;
  /** Whether the guard or the assigned value depends on symbolic attributes. */
  symbolic?: boolean;
  attribute?: AttributeName;
  disposition?: Disposition;
}

export interface PolicyPath {
  disposition: Disposition;
  condition: Expr[];
  record: RouteRecord;
  trace: TraceStep[];
}

export interface PolicyEvaluation {
  policy: string;
  disposition: Disposition | 'conditional';
  paths: PolicyPath[];
}

export interface ChainEvaluation {
  policies: string[];
  disposition: Disposition | 'conditional';
  paths: PolicyPath[];
}

export interface EvaluateOptions {
  /** Conditions already known to hold for the input route. */
  assumptions?: readonly Expr[];
  maxPaths?: number;
  /**
   * Policies a `call` expression may name, normally the owning node's
   * table. A call evaluates to the callee's accept condition on the current
   * route; the callee's assignments do not carry over to the caller.
   */
  policies?: Readonly<Record<string, Policy>>;
}

interface PathState {
  record: RouteRecord;
  condition: Expr[];
  trace: TraceStep[];
}

interface StepResult {
  state: PathState;
  disposition?: Disposition;
}

interface RunContext {
  policy: string;
  maxPaths: number;
  paths: number;
  env: EvaluationEnv;
}

function withContext<T>(ctx: RunContext, location: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CondenserError) {
      throw error.addContext({ policy: ctx.policy, statement: location });
    }
    throw error;
  }
}

function step(state: PathState, entry: TraceStep): PathState {
  return { ...state, trace: [...state.trace, entry] };
}

/**
 * Decide a symbolic guard from the path's condition, when possible.
 */
function assumedBranch(condition: readonly Expr[], guard: Expr): boolean | null {
  if (condition.length === 0) return null;
  const whenFalse = simplify(and(...condition, negate(guard)));
  if (whenFalse.kind === 'bool' && !whenFalse.value) return true;
  const whenTrue = simplify(and(...condition, guard));
  if (whenTrue.kind === 'bool' && !whenTrue.value) return false;
  return null;
}

function runBlock(ctx: RunContext, statements: readonly Statement[], location: string, index: number, state: PathState): StepResult[] {
  if (index >= statements.length) return [{ state }];
  const here = location ? `${location}.${index}` : String(index);
  const results: StepResult[] = [];
  for (const result of runStatement(ctx, statements[index], here, state)) {
    if (result.disposition !== undefined) results.push(result);
    else results.push(...runBlock(ctx, statements, location, index + 1, result.state));
  }
  return results;
}

function runStatement(ctx: RunContext, stmt: Statement, location: string, state: PathState): StepResult[] {
  switch (stmt.kind) {
    case 'return':
      return [
        {
          state: step(state, { policy: ctx.policy, statement: location, action: 'return', disposition: stmt.disposition }),
          disposition: stmt.disposition,
        },
      ];

    case 'set': {
      const value = withContext(ctx, location, () => partialEvaluate(stmt.value, state.record, ctx.env));
      const record = withContext(ctx, location, () => state.record.with(stmt.attribute, value));
      return [
        {
          state: step(
            { ...state, record },
            {
              policy: ctx.policy,
              statement: location,
              action: 'assign',
              attribute: stmt.attribute,
              symbolic: !isLiteral(value),
            },
          ),
        },
      ];
    }

    case 'if': {
      const guard = withContext(ctx, location, () => {
        const value = partialEvaluate(stmt.guard, state.record, ctx.env);
        if (value.kind !== 'bool' && isLiteral(value)) {
          throw new InterpretError(`Guard evaluated to a ${value.kind} literal`);
        }
        return value;
      });

      const take = (branch: boolean, from: PathState, symbolic: boolean): StepResult[] =>
        runBlock(
          ctx,
          branch ? stmt.trueBranch : stmt.falseBranch,
          `${location}.${branch}`,
          0,
          step(from, { policy: ctx.policy, statement: location, action: 'branch', branch, symbolic }),
        );

      if (guard.kind === 'bool') return take(guard.value, state, false);

      const assumed = assumedBranch(state.condition, guard);
      if (assumed !== null) return take(assumed, state, true);

      ctx.paths += 1;
      if (ctx.paths > ctx.maxPaths) {
        throw new InterpretError(`Policy exceeds ${ctx.maxPaths} execution paths`, {
          policy: ctx.policy,
          statement: location,
        });
      }
      return [
        ...take(true, { ...state, condition: [...state.condition, guard] }, true),
        ...take(false, { ...state, condition: [...state.condition, negate(guard)] }, true),
      ];
    }
  }
}

function overallDisposition(paths: readonly PolicyPath[]): Disposition | 'conditional' {
  const first = paths[0]?.disposition ?? 'reject';
  return paths.every((p) => p.disposition === first) ? first : 'conditional';
}

/**
 * Evaluate one policy. Paths that fall off the end of the policy are
 * rejected.
 *
 * @throws InterpretError with the policy name and statement location
 */
export function evaluatePolicy(policy: Policy, record: RouteRecord, options: EvaluateOptions = {}): PolicyEvaluation {
  return runPolicy(policy, record, options, [policy.name]);
}

function callEnv(options: EvaluateOptions, stack: readonly string[]): EvaluationEnv {
  return {
    call: (name, record) => {
      if (stack.includes(name)) {
        throw new InterpretError(`Recursive call to policy '${name}'`);
      }
      const table = options.policies;
      if (!table || !Object.hasOwn(table, name)) {
        throw new InterpretError(`Call to undefined policy '${name}'`);
      }
      const evaluation = runPolicy(table[name], record, { maxPaths: options.maxPaths, policies: table }, [...stack, name]);
      return residualFor(evaluation, 'accept');
    },
  };
}

function runPolicy(policy: Policy, record: RouteRecord, options: EvaluateOptions, stack: readonly string[]): PolicyEvaluation {
  const ctx: RunContext = {
    policy: policy.name,
    maxPaths: options.maxPaths ?? DEFAULT_MAX_PATHS,
    paths: 1,
    env: callEnv(options, stack),
  };
  const start: PathState = { record, condition: [...(options.assumptions ?? [])], trace: [] };

  const paths = runBlock(ctx, policy.statements, '', 0, start).map((result): PolicyPath => {
    if (result.disposition !== undefined) {
      return { disposition: result.disposition, ...result.state };
    }
    return {
      disposition: 'reject',
      record: result.state.record,
      condition: result.state.condition,
      trace: [
        ...result.state.trace,
        { policy: policy.name, statement: 'end', action: 'default', disposition: 'reject' },
      ],
    };
  });

  return { policy: policy.name, disposition: overallDisposition(paths), paths };
}

/**
 * Evaluate an interface's ordered policy chain. A path ending in `pass`
 * continues into the next policy; `pass` out of the last policy rejects. An
 * empty chain accepts the route unchanged.
 */
export function evaluateChain(
  policies: readonly Policy[],
  record: RouteRecord,
  options: EvaluateOptions = {},
): ChainEvaluation {
  const names = policies.map((p) => p.name);
  const assumptions = [...(options.assumptions ?? [])];
  const maxPaths = options.maxPaths ?? DEFAULT_MAX_PATHS;

  if (policies.length === 0) {
    return {
      policies: names,
      disposition: 'accept',
      paths: [{ disposition: 'accept', condition: assumptions, record, trace: [] }],
    };
  }

  let frontier: PathState[] = [{ record, condition: assumptions, trace: [] }];
  const finished: PolicyPath[] = [];

  for (const policy of policies) {
    const next: PathState[] = [];
    for (const state of frontier) {
      const evaluation = evaluatePolicy(policy, state.record, {
        assumptions: state.condition,
        maxPaths,
        policies: options.policies,
      });
      for (const path of evaluation.paths) {
        const trace = [...state.trace, ...path.trace];
        if (path.disposition === 'pass') next.push({ record: path.record, condition: path.condition, trace });
        else finished.push({ ...path, trace });
      }
    }
    if (finished.length + next.length > maxPaths) {
      throw new InterpretError(`Policy chain exceeds ${maxPaths} execution paths`, { policy: policy.name });
    }
    frontier = next;
  }

  const last = names[names.length - 1];
  for (const state of frontier) {
    finished.push({
      disposition: 'reject',
      record: state.record,
      condition: state.condition,
      trace: [...state.trace, { policy: last, statement: 'end', action: 'default', disposition: 'reject' }],
    });
  }

  return { policies: names, disposition: overallDisposition(finished), paths: finished };
}

/**
 * The condition under which an evaluation ends in `disposition`: the
 * simplified disjunction of the matching paths' conditions.
 */
export function residualFor(evaluation: { paths: readonly PolicyPath[] }, disposition: Disposition): Expr {
  const matching = evaluation.paths.filter((p) => p.disposition === disposition);
  if (matching.length === 0) return bool(false);
  return simplify(or(...matching.map((p) => and(...p.condition))));
}
