/**
 * EntityFactory - main entry point for entity construction
 *
 * Every `add*` method follows the same sequence: version gate, input
 * validation and geometry derivation, attribute assembly, and finally one
 * `createEntity` call per logical entity. Nothing reaches the database before
 * all checks have passed.
 */

import type { PointLike, Vec3 } from '../num/vec3.js';
import { toVec3, ZERO3 } from '../num/vec3.js';
import { roundTo } from '../num/tolerance.js';
import type { AttributeSet } from '../entity/attributes.js';
import { assemble, takeBooleanOption } from '../entity/attributes.js';
import { ConfigurationError, ValueError } from '../entity/errors.js';
import { PolylineFlags, SplineFlags, LwpolylineFlags, bitmask } from '../entity/flags.js';
import { formatPoints, LWPOLYLINE_FORMAT } from '../entity/lwpolyline.js';
import { normalizeQuad, quadAttributes } from '../entity/quad.js';
import { templateFor } from '../entity/templates.js';
import type { EntityKind, FormatVersion } from '../entity/version.js';
import { requireVersion } from '../entity/version.js';
import type { BSplineFrame } from '../geom/bspline.js';
import {
  closedFrame,
  closedRationalFrame,
  isRational,
  openFrame,
  openRationalFrame,
  requirePointCount,
  validateDegree,
} from '../geom/bspline.js';
import type { FitOptions } from '../geom/fit.js';
import { approximate, interpolate } from '../geom/fit.js';
import { composeAutoAttribs } from '../blocks/autoBlock.js';
import type {
  AlignedDimensionInput,
  DelegatedDimensionRequest,
  DimensionRequest,
  DimensionStyleInput,
  LinearDimensionInput,
  MultiPointLinearInput,
} from '../dimension/types.js';
import { dimensionAttributes, resolveAligned, resolveDimension, resolveLinear } from '../dimension/resolve.js';
import { resolveMultiPointLinear } from '../dimension/multiPoint.js';
import type { FactoryOptions, ResolvedFactoryOptions } from './options.js';
import { resolveFactoryOptions } from './options.js';
import type {
  ArrowLibrary,
  BlockTable,
  DimensionRenderer,
  EntityDatabase,
  EntityHandle,
  ImageDefinition,
  UnderlayDefinition,
} from './types.js';

export interface EllipseOptions {
  majorAxis?: PointLike;
  /** Minor to major axis ratio, at most 1 */
  ratio?: number;
  startParam?: number;
  endParam?: number;
}

export type SplineFitOptions = Omit<FitOptions, 'ctx'>;

/**
 * A created DIMENSION entity whose geometry block is not built yet.
 * Callers may adjust the request before calling `render()`.
 */
export class PendingDimension {
  readonly handle: EntityHandle;
  readonly request: DimensionRequest;
  private readonly renderer?: DimensionRenderer;

  constructor(handle: EntityHandle, request: DimensionRequest, renderer?: DimensionRenderer) {
    this.handle = handle;
    this.request = request;
    this.renderer = renderer;
  }

  render(): void {
    if (!this.renderer) {
      throw new ConfigurationError('dimension renderer', 'render()');
    }
    this.renderer.render(this.handle, this.request);
  }
}

export class EntityFactory {
  private readonly database: EntityDatabase;
  private readonly options: ResolvedFactoryOptions;

  constructor(database: EntityDatabase, options?: FactoryOptions) {
    this.database = database;
    this.options = resolveFactoryOptions(options);
  }

  get dxfversion(): FormatVersion {
    return this.options.dxfversion;
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[dxfcraft] ${message}`);
    }
  }

  private gate(...kinds: EntityKind[]): void {
    for (const kind of kinds) {
      requireVersion(kind, this.options.dxfversion);
    }
  }

  private create(kind: EntityKind, attribs: AttributeSet, database: EntityDatabase = this.database): EntityHandle {
    const handle = database.createEntity(kind, attribs);
    this.log(`created ${kind} #${handle}`);
    return handle;
  }

  /**
   * Assemble template < attribs < enforced and create. Callers gate first.
   */
  private newEntity(kind: EntityKind, attribs: AttributeSet | undefined, enforced: AttributeSet): EntityHandle {
    return this.create(kind, assemble(templateFor(kind), attribs, enforced));
  }

  private requireBlocks(operation: string): BlockTable {
    if (!this.options.blocks) {
      throw new ConfigurationError('block table', operation);
    }
    return this.options.blocks;
  }

  private requireArrows(operation: string): ArrowLibrary {
    if (!this.options.arrows) {
      throw new ConfigurationError('arrow library', operation);
    }
    return this.options.arrows;
  }

  // ==========================================================================
  // Basic entities
  // ==========================================================================

  addPoint(location: PointLike, attribs?: AttributeSet): EntityHandle {
    this.gate('POINT');
    return this.newEntity('POINT', attribs, { location: toVec3(location) });
  }

  addLine(start: PointLike, end: PointLike, attribs?: AttributeSet): EntityHandle {
    this.gate('LINE');
    return this.newEntity('LINE', attribs, { start: toVec3(start), end: toVec3(end) });
  }

  addCircle(center: PointLike, radius: number, attribs?: AttributeSet): EntityHandle {
    this.gate('CIRCLE');
    return this.newEntity('CIRCLE', attribs, { center: toVec3(center), radius });
  }

  /**
   * Ellipse from `startParam` to `endParam`, counter-clockwise; a full
   * ellipse runs from 0 to 2π.
   */
  addEllipse(center: PointLike, options: EllipseOptions = {}, attribs?: AttributeSet): EntityHandle {
    this.gate('ELLIPSE');
    const ratio = options.ratio ?? 1;
    if (!(ratio <= 1)) {
      throw new ValueError('ratio', `minor/major axis ratio has to be <= 1.0, got ${ratio}`);
    }
    return this.newEntity('ELLIPSE', attribs, {
      center: toVec3(center),
      major_axis: toVec3(options.majorAxis ?? [1, 0, 0]),
      ratio,
      start_param: options.startParam ?? 0,
      end_param: options.endParam ?? 2 * Math.PI,
    });
  }

  /**
   * Arc between two angles in degrees. Arcs are stored counter-clockwise, so
   * a clockwise arc swaps its angles.
   */
  addArc(
    center: PointLike,
    radius: number,
    startAngle: number,
    endAngle: number,
    isCounterClockwise = true,
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('ARC');
    return this.newEntity('ARC', attribs, {
      center: toVec3(center),
      radius,
      start_angle: isCounterClockwise ? startAngle : endAngle,
      end_angle: isCounterClockwise ? endAngle : startAngle,
    });
  }

  addSolid(points: readonly PointLike[], attribs?: AttributeSet): EntityHandle {
    return this.addQuadrilateral('SOLID', points, attribs);
  }

  addTrace(points: readonly PointLike[], attribs?: AttributeSet): EntityHandle {
    return this.addQuadrilateral('TRACE', points, attribs);
  }

  add3dFace(points: readonly PointLike[], attribs?: AttributeSet): EntityHandle {
    return this.addQuadrilateral('3DFACE', points, attribs);
  }

  private addQuadrilateral(kind: EntityKind, points: readonly PointLike[], attribs?: AttributeSet): EntityHandle {
    this.gate(kind);
    return this.newEntity(kind, attribs, quadAttributes(normalizeQuad(points)));
  }

  /**
   * Single line text; `insert` defaults to the origin
   */
  addText(text: string, attribs?: AttributeSet): EntityHandle {
    this.gate('TEXT');
    return this.newEntity('TEXT', attribs, { text });
  }

  addShape(name: string, insert: PointLike = [0, 0], size = 1, attribs?: AttributeSet): EntityHandle {
    this.gate('SHAPE');
    return this.newEntity('SHAPE', attribs, { name, insert: toVec3(insert), size });
  }

  addBlockref(name: string, insert: PointLike, attribs?: AttributeSet): EntityHandle {
    this.gate('INSERT');
    return this.newEntity('INSERT', attribs, { name, insert: toVec3(insert) });
  }

  /**
   * Block reference with one ATTRIB per attribute definition of block `name`.
   *
   * The reference and its attributes live in a new anonymous block, placed
   * relative to the base point of `name`; the returned INSERT references that
   * anonymous block at `insert`. Tags missing from `values` get "".
   */
  addAutoBlockref(
    name: string,
    insert: PointLike,
    values: Readonly<Record<string, string>>,
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('INSERT', 'ATTRIB');
    const blocks = this.requireBlocks('addAutoBlockref');
    const attdefs = blocks.attributeDefinitions(name);
    if (!attdefs) {
      throw new ValueError('name', `block "${name}" does not exist`);
    }
    const requests = composeAutoAttribs(attdefs, values);

    const autoblock = blocks.newAnonymousBlock();
    const inner = this.create(
      'INSERT',
      assemble(templateFor('INSERT'), {}, { name, insert: ZERO3, attribs_follow: requests.length > 0 }),
      autoblock.database
    );
    for (const req of requests) {
      this.create(
        'ATTRIB',
        assemble(templateFor('ATTRIB'), req.attribs, {
          tag: req.tag,
          text: req.text,
          insert: req.insert,
          owner: inner,
        }),
        autoblock.database
      );
    }
    return this.addBlockref(autoblock.name, insert, attribs);
  }

  /**
   * Stand-alone ATTRIB
   */
  addAttrib(tag: string, text: string, insert: PointLike = [0, 0], attribs?: AttributeSet): EntityHandle {
    this.gate('ATTRIB');
    return this.newEntity('ATTRIB', attribs, { tag, text, insert: toVec3(insert) });
  }

  // ==========================================================================
  // Polylines and meshes
  // ==========================================================================

  /**
   * 2D POLYLINE; the pseudo-attribute `closed` sets the closed flag
   */
  addPolyline2d(points: readonly PointLike[], attribs: AttributeSet = {}): EntityHandle {
    return this.addPolyline(points, attribs, 0);
  }

  addPolyline3d(points: readonly PointLike[], attribs: AttributeSet = {}): EntityHandle {
    return this.addPolyline(points, attribs, PolylineFlags.POLYLINE_3D);
  }

  private addPolyline(points: readonly PointLike[], attribs: AttributeSet, mode: number): EntityHandle {
    this.gate('POLYLINE');
    const [closed, rest] = takeBooleanOption(attribs, 'closed');
    return this.newEntity('POLYLINE', rest, {
      flags: bitmask(mode | (closed ? PolylineFlags.CLOSED : 0)),
      vertices: points.map(toVec3),
    });
  }

  /**
   * Polygon mesh of m × n vertices (each at least 2), all at the origin.
   * Pseudo-attributes `m_close` and `n_close` close the mesh.
   */
  addPolymesh(size: readonly [number, number] = [3, 3], attribs: AttributeSet = {}): EntityHandle {
    this.gate('POLYLINE');
    const mCount = Math.max(size[0], 2);
    const nCount = Math.max(size[1], 2);
    const [mClose, withoutM] = takeBooleanOption(attribs, 'm_close');
    const [nClose, rest] = takeBooleanOption(withoutM, 'n_close');
    const vertices: Vec3[] = [];
    for (let i = 0; i < mCount * nCount; i++) {
      vertices.push([0, 0, 0]);
    }
    return this.newEntity('POLYLINE', rest, {
      flags: bitmask(
        PolylineFlags.POLYMESH_3D |
          (mClose ? PolylineFlags.MESH_CLOSED_M : 0) |
          (nClose ? PolylineFlags.MESH_CLOSED_N : 0)
      ),
      m_count: mCount,
      n_count: nCount,
      vertices,
    });
  }

  addPolyface(attribs: AttributeSet = {}): EntityHandle {
    this.gate('POLYLINE');
    const [mClose, withoutM] = takeBooleanOption(attribs, 'm_close');
    const [nClose, rest] = takeBooleanOption(withoutM, 'n_close');
    return this.newEntity('POLYLINE', rest, {
      flags: bitmask(
        PolylineFlags.POLYFACE |
          (mClose ? PolylineFlags.MESH_CLOSED_M : 0) |
          (nClose ? PolylineFlags.MESH_CLOSED_N : 0)
      ),
    });
  }

  /**
   * Light-weight polyline; point values are ordered by `format` (see
   * LWPOLYLINE_FORMAT). The pseudo-attribute `closed` closes the polyline.
   */
  addLwpolyline(
    points: readonly (readonly number[])[],
    format: string = LWPOLYLINE_FORMAT,
    attribs: AttributeSet = {}
  ): EntityHandle {
    this.gate('LWPOLYLINE');
    const [closed, rest] = takeBooleanOption(attribs, 'closed');
    return this.newEntity('LWPOLYLINE', rest, {
      flags: bitmask(closed ? LwpolylineFlags.CLOSED : 0),
      points: formatPoints(points, format),
    });
  }

  // ==========================================================================
  // R2000+ entities
  // ==========================================================================

  addMtext(text: string, attribs?: AttributeSet): EntityHandle {
    this.gate('MTEXT');
    return this.newEntity('MTEXT', attribs, { text });
  }

  addRay(start: PointLike, unitVector: PointLike, attribs?: AttributeSet): EntityHandle {
    this.gate('RAY');
    return this.newEntity('RAY', attribs, { start: toVec3(start), unit_vector: toVec3(unitVector) });
  }

  addXline(start: PointLike, unitVector: PointLike, attribs?: AttributeSet): EntityHandle {
    this.gate('XLINE');
    return this.newEntity('XLINE', attribs, { start: toVec3(start), unit_vector: toVec3(unitVector) });
  }

  /**
   * SPLINE defined by fit points only; the reading CAD application computes
   * control points and knots. Without fit points all data is left to the
   * caller's attributes.
   */
  addSpline(fitPoints?: readonly PointLike[], degree = 3, attribs?: AttributeSet): EntityHandle {
    this.gate('SPLINE');
    validateDegree(degree);
    const enforced: AttributeSet = { degree };
    if (fitPoints) {
      requirePointCount(fitPoints.length, degree);
      enforced.fit_points = fitPoints.map(toVec3);
    }
    return this.newEntity('SPLINE', attribs, enforced);
  }

  /**
   * SPLINE through all fit points, control frame computed here
   */
  addSplineControlFrame(
    fitPoints: readonly PointLike[],
    options: SplineFitOptions = {},
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('SPLINE');
    return this.addFrame(interpolate(fitPoints, { ...options, ctx: this.options.ctx }), attribs);
  }

  /**
   * SPLINE approximating the fit points with `count` control points
   */
  addSplineApprox(
    fitPoints: readonly PointLike[],
    count: number,
    options: SplineFitOptions = {},
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('SPLINE');
    return this.addFrame(approximate(fitPoints, count, { ...options, ctx: this.options.ctx }), attribs);
  }

  /**
   * Clamped spline starting and ending at the first and last control point
   */
  addOpenSpline(
    controlPoints: readonly PointLike[],
    degree = 3,
    knots?: readonly number[],
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('SPLINE');
    return this.addFrame(openFrame(controlPoints, degree, knots), attribs);
  }

  addClosedSpline(controlPoints: readonly PointLike[], degree = 3, attribs?: AttributeSet): EntityHandle {
    this.gate('SPLINE');
    return this.addFrame(closedFrame(controlPoints, degree), attribs);
  }

  addRationalSpline(
    controlPoints: readonly PointLike[],
    weights: readonly number[],
    degree = 3,
    knots?: readonly number[],
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('SPLINE');
    return this.addFrame(openRationalFrame(controlPoints, weights, degree, knots), attribs);
  }

  addClosedRationalSpline(
    controlPoints: readonly PointLike[],
    weights: readonly number[],
    degree = 3,
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('SPLINE');
    return this.addFrame(closedRationalFrame(controlPoints, weights, degree), attribs);
  }

  private addFrame(frame: BSplineFrame, attribs?: AttributeSet): EntityHandle {
    let flags = frame.closed ? SplineFlags.CLOSED | SplineFlags.PERIODIC : 0;
    if (isRational(frame)) {
      flags |= SplineFlags.RATIONAL;
    }
    return this.newEntity('SPLINE', attribs, {
      degree: frame.degree,
      flags: bitmask(flags),
      control_points: frame.controlPoints,
      knots: frame.knots,
      weights: frame.weights,
    });
  }

  // ==========================================================================
  // ACIS based entities (data is passed through uninterpreted)
  // ==========================================================================

  addBody(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('BODY', acisData, attribs);
  }

  addRegion(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('REGION', acisData, attribs);
  }

  add3dSolid(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('3DSOLID', acisData, attribs);
  }

  addSurface(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('SURFACE', acisData, attribs);
  }

  addExtrudedSurface(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('EXTRUDEDSURFACE', acisData, attribs);
  }

  addLoftedSurface(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('LOFTEDSURFACE', acisData, attribs);
  }

  addRevolvedSurface(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('REVOLVEDSURFACE', acisData, attribs);
  }

  addSweptSurface(acisData?: readonly string[], attribs?: AttributeSet): EntityHandle {
    return this.addAcis('SWEPTSURFACE', acisData, attribs);
  }

  private addAcis(kind: EntityKind, acisData: readonly string[] | undefined, attribs?: AttributeSet): EntityHandle {
    this.gate(kind);
    return this.newEntity(kind, attribs, acisData ? { acis_data: [...acisData] } : {});
  }

  // ==========================================================================
  // Hatch, mesh, raster images and underlays
  // ==========================================================================

  /**
   * Solid filled hatch in ACI `color` (7 = black/white)
   */
  addHatch(color = 7, attribs?: AttributeSet): EntityHandle {
    this.gate('HATCH');
    return this.newEntity('HATCH', attribs, { solid_fill: 1, color, pattern_name: 'SOLID' });
  }

  addMesh(attribs?: AttributeSet): EntityHandle {
    this.gate('MESH');
    return this.newEntity('MESH', attribs, {});
  }

  /**
   * Raster image of `sizeInUnits` drawing units, rotated by `rotation`
   * degrees about the z-axis. Images are placed in the xy-plane only.
   */
  addImage(
    imageDef: ImageDefinition,
    insert: PointLike,
    sizeInUnits: readonly [number, number],
    rotation = 0,
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate('IMAGE');
    const [xPixels, yPixels] = imageDef.imageSize;
    if (!(xPixels > 0) || !(yPixels > 0)) {
      throw new ValueError('imageSize', `image size must be positive, got ${xPixels} x ${yPixels}`);
    }
    const xAngle = (rotation * Math.PI) / 180;
    const yAngle = xAngle + Math.PI / 2;
    const pixelVector = (unitsPerPixel: number, angle: number): Vec3 => [
      roundTo(Math.cos(angle) * unitsPerPixel, 6),
      roundTo(Math.sin(angle) * unitsPerPixel, 6),
      0,
    ];

    const handle = this.newEntity('IMAGE', attribs, {
      insert: toVec3(insert),
      u_pixel: pixelVector(sizeInUnits[0] / xPixels, xAngle),
      v_pixel: pixelVector(sizeInUnits[1] / yPixels, yAngle),
      image_def_handle: imageDef.handle,
      image_size: [xPixels, yPixels],
    });
    imageDef.addReactor(handle);
    return handle;
  }

  /**
   * PDF, DWF or DGN underlay, the kind comes from `underlayDef`. `scale` is a
   * uniform factor or per-axis factors.
   */
  addUnderlay(
    underlayDef: UnderlayDefinition,
    insert: PointLike = [0, 0, 0],
    scale: number | PointLike = 1,
    rotation = 0,
    attribs?: AttributeSet
  ): EntityHandle {
    this.gate(underlayDef.entityKind);
    const [sx, sy, sz] = typeof scale === 'number' ? [scale, scale, scale] : toVec3(scale);
    const handle = this.newEntity(underlayDef.entityKind, attribs, {
      insert: toVec3(insert),
      underlay_def_handle: underlayDef.handle,
      rotation,
      scale_x: sx,
      scale_y: sy,
      scale_z: sz,
    });
    underlayDef.addReactor(handle);
    return handle;
  }

  // ==========================================================================
  // Dimensions
  // ==========================================================================

  private createDimension(request: DimensionRequest): PendingDimension {
    const handle = this.create('DIMENSION', dimensionAttributes(request));
    return new PendingDimension(handle, request, this.options.renderer);
  }

  private withStyle<T extends DimensionStyleInput>(input: T): T {
    return { ...input, dimstyle: input.dimstyle ?? this.options.dimstyle };
  }

  /**
   * Horizontal (angle 0), vertical (angle 90) or rotated dimension. Call
   * `render()` on the result to build its geometry.
   */
  addLinearDim(input: LinearDimensionInput): PendingDimension {
    this.gate('DIMENSION');
    return this.createDimension(resolveLinear(this.withStyle(input), this.options.ctx));
  }

  /**
   * Dimension parallel to p1 → p2 at `distance`
   */
  addAlignedDim(input: AlignedDimensionInput): PendingDimension {
    this.gate('DIMENSION');
    return this.createDimension(resolveAligned(this.withStyle(input), this.options.ctx));
  }

  /**
   * Continued linear dimensions between consecutive points, rendered at once
   */
  addMultiPointLinearDim(input: MultiPointLinearInput): PendingDimension[] {
    this.gate('DIMENSION');
    if (!this.options.renderer) {
      throw new ConfigurationError('dimension renderer', 'addMultiPointLinearDim');
    }
    const requests = resolveMultiPointLinear(this.withStyle(input), this.options.ctx);
    return requests.map((request) => {
      const dim = this.createDimension(request);
      dim.render();
      return dim;
    });
  }

  addAngularDim(input?: DimensionStyleInput): PendingDimension {
    return this.addDelegatedDim('angular', input);
  }

  addAngular3pDim(input?: DimensionStyleInput): PendingDimension {
    return this.addDelegatedDim('angular3p', input);
  }

  addDiameterDim(input?: DimensionStyleInput): PendingDimension {
    return this.addDelegatedDim('diameter', input);
  }

  addRadiusDim(input?: DimensionStyleInput): PendingDimension {
    return this.addDelegatedDim('radius', input);
  }

  addOrdinateDim(input?: DimensionStyleInput): PendingDimension {
    return this.addDelegatedDim('ordinate', input);
  }

  private addDelegatedDim(kind: DelegatedDimensionRequest['kind'], input: DimensionStyleInput = {}): PendingDimension {
    this.gate('DIMENSION');
    return this.createDimension(resolveDimension(kind, this.withStyle(input)));
  }

  // ==========================================================================
  // Arrows
  // ==========================================================================

  /**
   * Draw arrow `name` as entities; returns the connection point
   */
  addArrow(name: string, insert: PointLike, size = 1, rotation = 0, attribs: AttributeSet = {}): Vec3 {
    const arrows = this.requireArrows('addArrow');
    return arrows.renderArrow(this, { name, insert: toVec3(insert), size, rotation, attribs: { ...attribs } });
  }

  /**
   * Insert arrow `name` as block reference; returns the connection point
   */
  addArrowBlockref(name: string, insert: PointLike, size = 1, rotation = 0, attribs: AttributeSet = {}): Vec3 {
    const arrows = this.requireArrows('addArrowBlockref');
    return arrows.insertArrow(this, { name, insert: toVec3(insert), size, rotation, attribs: { ...attribs } });
  }
}
