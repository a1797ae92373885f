/**
 * @dxfcraft/core - parametric entity construction for DXF documents
 *
 * ## Primary API
 * - EntityFactory: gates, derives and assembles entity attributes, then hands
 *   them to an EntityDatabase
 *
 * ## Building blocks
 * - num: vectors, tolerances, robust predicates, small linear solves
 * - geom: parametrization, knot vectors, B-spline frames, fitting
 * - entity: format versions, attribute assembly, flags, quadrilaterals
 * - dimension: linear/aligned/multi-point dimension geometry
 * - blocks: attribute filling for automatic block references
 */

export * from './api/index.js';

// num
export * from './num/vec3.js';
export * from './num/tolerance.js';
export * from './num/predicates.js';

// geom
export * from './geom/parametrize.js';
export * from './geom/bspline.js';
export * from './geom/fit.js';

// entity
export * from './entity/errors.js';
export * from './entity/version.js';
export * from './entity/attributes.js';
export * from './entity/flags.js';
export * from './entity/templates.js';
export * from './entity/quad.js';
export * from './entity/lwpolyline.js';

// dimension
export * from './dimension/types.js';
export * from './dimension/resolve.js';
export * from './dimension/multiPoint.js';

// blocks
export * from './blocks/autoBlock.js';
