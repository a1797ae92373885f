/**
 * Contracts of the collaborators the factory talks to
 */

import type { Vec3 } from '../num/vec3.js';
import type { AttributeSet } from '../entity/attributes.js';
import type { EntityKind } from '../entity/version.js';
import type { DimensionRequest } from '../dimension/types.js';
import type { EntityFactory } from './EntityFactory.js';

/**
 * Handle allocated by the document, e.g. "2F"
 */
export type EntityHandle = string;

/**
 * Document database owning the entities of one layout or block.
 * Expected to validate attributes against the kind's schema.
 */
export interface EntityDatabase {
  createEntity(kind: EntityKind, attribs: AttributeSet): EntityHandle;
}

export interface BlockLayout {
  name: string;
  database: EntityDatabase;
}

export interface BlockTable {
  /** ATTDEF attribute sets of block `name`, or undefined for an unknown block */
  attributeDefinitions(name: string): readonly Readonly<AttributeSet>[] | undefined;
  /** Allocate a new anonymous block ("*U…") */
  newAnonymousBlock(): BlockLayout;
}

/**
 * Builds the dimension block for a created DIMENSION entity
 */
export interface DimensionRenderer {
  render(handle: EntityHandle, request: DimensionRequest): void;
}

export interface ArrowRequest {
  name: string;
  insert: Vec3;
  size: number;
  /** Degrees */
  rotation: number;
  attribs: AttributeSet;
}

/**
 * Arrow symbol library. Both calls return the connection point of the arrow.
 */
export interface ArrowLibrary {
  /** Draw the arrow as plain entities through `factory` */
  renderArrow(factory: EntityFactory, request: ArrowRequest): Vec3;
  /** Insert the arrow as a block reference through `factory` */
  insertArrow(factory: EntityFactory, request: ArrowRequest): Vec3;
}

export interface ImageDefinition {
  handle: EntityHandle;
  /** Pixels [x, y] */
  imageSize: readonly [number, number];
  addReactor(handle: EntityHandle): void;
}

export interface UnderlayDefinition {
  handle: EntityHandle;
  entityKind: 'PDFUNDERLAY' | 'DWFUNDERLAY' | 'DGNUNDERLAY';
  addReactor(handle: EntityHandle): void;
}
