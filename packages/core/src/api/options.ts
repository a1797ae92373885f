/**
 * Factory configuration
 */

import type { NumericContext, Tolerances } from '../num/tolerance.js';
import { createNumericContext } from '../num/tolerance.js';
import type { FormatVersion } from '../entity/version.js';
import { parseVersion } from '../entity/version.js';
import { DEFAULT_DIMSTYLE } from '../dimension/resolve.js';
import type { ArrowLibrary, BlockTable, DimensionRenderer } from './types.js';

export interface FactoryOptions {
  /** Active format version, release name or $ACADVER code */
  dxfversion?: FormatVersion | string;
  /** Dimension style used when a dimension names none */
  dimstyle?: string;
  tolerances?: Partial<Tolerances>;
  blocks?: BlockTable;
  renderer?: DimensionRenderer;
  arrows?: ArrowLibrary;
  /** Log every created entity to the console */
  verbose?: boolean;
}

export interface ResolvedFactoryOptions {
  dxfversion: FormatVersion;
  dimstyle: string;
  ctx: NumericContext;
  blocks?: BlockTable;
  renderer?: DimensionRenderer;
  arrows?: ArrowLibrary;
  verbose: boolean;
}

export const DEFAULT_FACTORY_OPTIONS: Readonly<{ dxfversion: FormatVersion; dimstyle: string; verbose: boolean }> = {
  dxfversion: 'R2013',
  dimstyle: DEFAULT_DIMSTYLE,
  verbose: false,
};

export function resolveFactoryOptions(options?: FactoryOptions): ResolvedFactoryOptions {
  return {
    dxfversion: parseVersion(options?.dxfversion ?? DEFAULT_FACTORY_OPTIONS.dxfversion),
    dimstyle: options?.dimstyle ?? DEFAULT_FACTORY_OPTIONS.dimstyle,
    ctx: createNumericContext(options?.tolerances),
    blocks: options?.blocks,
    renderer: options?.renderer,
    arrows: options?.arrows,
    verbose: options?.verbose ?? DEFAULT_FACTORY_OPTIONS.verbose,
  };
}
