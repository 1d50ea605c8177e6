/**
 * @file packages/core/src/workflows/convert-workflow.ts
 * @description Convert workflow: parses the raw quantity, resolves both unit names and
 *              runs the conversion. Rendering is left to the caller.
 */

import { convert, type ConversionWarning } from '../lib/converter';
import { unitRegistry, type UnitRegistry } from '../lib/registry';
import type { UnitDescriptor } from '../lib/units';
import { UnknownUnitError, type UnitSide } from '../shared/errors';
import { formatQuantity, parseQuantity } from '../shared/quantity';

export interface ConvertWorkflowOptions {
  value: string;
  from: string;
  to: string;
  registry?: UnitRegistry;
}

export interface ConvertWorkflowResult {
  value: number;
  result: number;
  from: UnitDescriptor;
  to: UnitDescriptor;
  fromInput: string;
  toInput: string;
  warnings: ConversionWarning[];
  summary: string;
}

const resolveUnit = (registry: UnitRegistry, which: UnitSide, input: string): UnitDescriptor => {
  const unit = registry.lookup(input);
  if (!unit) {
    throw new UnknownUnitError(which, input);
  }
  return unit;
};

export const runConvertWorkflow = (options: ConvertWorkflowOptions): ConvertWorkflowResult => {
  const registry = options.registry ?? unitRegistry;
  const value = parseQuantity(options.value);
  const from = resolveUnit(registry, 'from', options.from);
  const to = resolveUnit(registry, 'to', options.to);

  const outcome = convert(value, from, to);

  return {
    value,
    result: outcome.value,
    from,
    to,
    fromInput: options.from,
    toInput: options.to,
    warnings: outcome.warnings,
    summary: `${formatQuantity(value)} ${options.from} = ${formatQuantity(outcome.value)} ${options.to}`,
  };
};
