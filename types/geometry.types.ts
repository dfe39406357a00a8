/**
 * GEOMETRIC PRIMITIVES AND DXF
 * Responsibility: points, bounds, raw DXF circle/arc entities and the CAD primitive
 * records handed to the extractor.
 */
import { PrimitiveKind } from './enums.types';

export interface Point {
  x: number;
  y: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface DxfCircle {
  type: 'CIRCLE';
  center: Point;
  radius: number;
  layer: string;
}

export interface DxfArc {
  type: 'ARC';
  center: Point;
  radius: number;
  startAngle: number;
  endAngle: number;
  layer: string;
}

export type DxfEntity = DxfCircle | DxfArc;

/**
 * A CAD primitive as delivered by the loader. Angles are degrees, CCW, and only
 * meaningful for arcs.
 */
export interface CadPrimitive {
  kind: PrimitiveKind;
  centerX: number;
  centerY: number;
  radius: number;
  startAngle?: number;
  endAngle?: number;
  layer?: string;
}
