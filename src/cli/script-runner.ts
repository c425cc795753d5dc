/**
 * Operation scripts for the CLI.
 *
 * A script seeds ledger balances and lists steps to run in order:
 *
 *   {
 *     "balances": { "ST1ISSUER": 5000 },
 *     "steps": [
 *       { "caller": "ST1ADMIN", "operation": { "name": "setAuthority", "identity": "ST2AUTH" } },
 *       { "advanceHeight": 10 },
 *       { "query": { "name": "getItemCount" } }
 *     ]
 *   }
 */

import { RegistryHost } from '../host/registry-host';
import {
  MalformedOperationError,
  OperationReceipt,
  QueryAnswer,
  RegistryOperation,
  RegistryQuery,
  parseOperation,
  parseQuery,
} from '../host/operations';
import { BalanceLedger } from '../ledger/balance-ledger';
import { StructuredLogger } from '../logging/structured-logger';
import { Identity } from '../registry/registry-types';

export type ScriptStep =
  | { kind: 'advance'; blocks: number }
  | { kind: 'submit'; caller: Identity; operation: RegistryOperation }
  | { kind: 'query'; query: RegistryQuery };

export interface OperationScript {
  balances: Record<Identity, number>;
  steps: ScriptStep[];
}

export type StepOutcome =
  | { kind: 'advance'; height: number }
  | { kind: 'submit'; receipt: OperationReceipt }
  | { kind: 'query'; query: RegistryQuery; answer: QueryAnswer };

export interface ScriptSummary {
  applied: number;
  rejected: number;
  queries: number;
  finalHeight: number;
  outcomes: StepOutcome[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseStep(raw: unknown, index: number): ScriptStep {
  if (!isRecord(raw)) {
    throw new MalformedOperationError(`Step ${index}: must be an object`);
  }

  if ('advanceHeight' in raw) {
    const blocks = raw.advanceHeight;
    if (typeof blocks !== 'number') {
      throw new MalformedOperationError(`Step ${index}: "advanceHeight" must be a number`);
    }
    return { kind: 'advance', blocks };
  }

  if ('query' in raw) {
    return { kind: 'query', query: parseQuery(raw.query) };
  }

  if (typeof raw.caller !== 'string' || raw.caller.length === 0) {
    throw new MalformedOperationError(`Step ${index}: "caller" must be a non-empty string`);
  }
  return { kind: 'submit', caller: raw.caller, operation: parseOperation(raw.operation) };
}

export function parseScript(raw: unknown): OperationScript {
  if (!isRecord(raw)) {
    throw new MalformedOperationError('Script must be an object');
  }

  const balances: Record<Identity, number> = {};
  if (raw.balances !== undefined) {
    if (!isRecord(raw.balances)) {
      throw new MalformedOperationError('"balances" must map identities to amounts');
    }
    for (const [identity, amount] of Object.entries(raw.balances)) {
      if (typeof amount !== 'number' || !Number.isSafeInteger(amount) || amount < 0) {
        throw new MalformedOperationError(`Balance of ${identity} must be a non-negative integer`);
      }
      balances[identity] = amount;
    }
  }

  if (!Array.isArray(raw.steps)) {
    throw new MalformedOperationError('"steps" must be an array');
  }

  return { balances, steps: raw.steps.map((step, index) => parseStep(step, index)) };
}

export function runScript(
  host: RegistryHost,
  ledger: BalanceLedger,
  script: OperationScript,
  log: StructuredLogger
): ScriptSummary {
  for (const [identity, amount] of Object.entries(script.balances)) {
    ledger.credit(identity, amount);
  }

  const summary: ScriptSummary = { applied: 0, rejected: 0, queries: 0, finalHeight: host.height, outcomes: [] };

  for (const step of script.steps) {
    switch (step.kind) {
      case 'advance': {
        const height = host.advanceHeight(step.blocks);
        summary.outcomes.push({ kind: 'advance', height });
        break;
      }
      case 'submit': {
        const receipt = host.submit(step.caller, step.operation);
        if (receipt.result.ok) {
          summary.applied++;
          log.info('Script', `${receipt.name} ok`, { value: receipt.result.value });
        } else {
          summary.rejected++;
          log.warn('Script', `${receipt.name} failed`, {
            kind: receipt.result.error.kind,
            code: receipt.result.error.code,
            message: receipt.result.error.message,
          });
        }
        summary.outcomes.push({ kind: 'submit', receipt });
        break;
      }
      case 'query': {
        const answer = host.query(step.query);
        summary.queries++;
        log.info('Script', step.query.name, { answer: answer ?? null });
        summary.outcomes.push({ kind: 'query', query: step.query, answer });
        break;
      }
    }
  }

  summary.finalHeight = host.height;
  return summary;
}
