/**
 * Format versions and the version gate
 *
 * The minimum version of each entity kind lives in one table; factory methods
 * never compare versions themselves.
 */

import { ValueError, VersionError } from './errors.js';

export type FormatVersion = 'R12' | 'R2000' | 'R2004' | 'R2007' | 'R2010' | 'R2013' | 'R2018';

/**
 * Release name → $ACADVER code, in ascending order
 */
export const VERSION_CODES: Readonly<Record<FormatVersion, string>> = {
  R12: 'AC1009',
  R2000: 'AC1015',
  R2004: 'AC1018',
  R2007: 'AC1021',
  R2010: 'AC1024',
  R2013: 'AC1027',
  R2018: 'AC1032',
};

const ORDER: readonly FormatVersion[] = ['R12', 'R2000', 'R2004', 'R2007', 'R2010', 'R2013', 'R2018'];

export function versionRank(v: FormatVersion): number {
  return ORDER.indexOf(v);
}

export function compareVersions(a: FormatVersion, b: FormatVersion): number {
  return versionRank(a) - versionRank(b);
}

/**
 * Accept a release name (`R2000`) or an $ACADVER code (`AC1015`)
 */
export function parseVersion(value: string): FormatVersion {
  const upper = value.toUpperCase();
  for (const v of ORDER) {
    if (v === upper || VERSION_CODES[v] === upper) {
      return v;
    }
  }
  throw new ValueError('dxfversion', `unknown DXF version "${value}"`);
}

export type EntityKind =
  | 'POINT'
  | 'LINE'
  | 'CIRCLE'
  | 'ARC'
  | 'ELLIPSE'
  | 'SOLID'
  | 'TRACE'
  | '3DFACE'
  | 'TEXT'
  | 'SHAPE'
  | 'INSERT'
  | 'ATTRIB'
  | 'POLYLINE'
  | 'LWPOLYLINE'
  | 'MTEXT'
  | 'RAY'
  | 'XLINE'
  | 'SPLINE'
  | 'BODY'
  | 'REGION'
  | '3DSOLID'
  | 'SURFACE'
  | 'EXTRUDEDSURFACE'
  | 'LOFTEDSURFACE'
  | 'REVOLVEDSURFACE'
  | 'SWEPTSURFACE'
  | 'HATCH'
  | 'MESH'
  | 'IMAGE'
  | 'PDFUNDERLAY'
  | 'DWFUNDERLAY'
  | 'DGNUNDERLAY'
  | 'DIMENSION';

const MIN_VERSION: Readonly<Partial<Record<EntityKind, FormatVersion>>> = {
  ELLIPSE: 'R2000',
  LWPOLYLINE: 'R2000',
  MTEXT: 'R2000',
  RAY: 'R2000',
  XLINE: 'R2000',
  SPLINE: 'R2000',
  BODY: 'R2000',
  REGION: 'R2000',
  '3DSOLID': 'R2000',
  HATCH: 'R2000',
  MESH: 'R2000',
  IMAGE: 'R2000',
  PDFUNDERLAY: 'R2000',
  DWFUNDERLAY: 'R2000',
  DGNUNDERLAY: 'R2000',
  SURFACE: 'R2007',
  EXTRUDEDSURFACE: 'R2007',
  LOFTEDSURFACE: 'R2007',
  REVOLVEDSURFACE: 'R2007',
  SWEPTSURFACE: 'R2007',
};

export function minimumVersion(kind: EntityKind): FormatVersion {
  return MIN_VERSION[kind] ?? 'R12';
}

export function isSupported(kind: EntityKind, active: FormatVersion): boolean {
  return compareVersions(active, minimumVersion(kind)) >= 0;
}

/**
 * Throw a VersionError if `kind` cannot be created under `active`
 */
export function requireVersion(kind: EntityKind, active: FormatVersion): void {
  const required = minimumVersion(kind);
  if (compareVersions(active, required) < 0) {
    throw new VersionError(kind, required, active);
  }
}
