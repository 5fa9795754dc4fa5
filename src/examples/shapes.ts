/**
 * Shape geometry dispatched on argument types.
 *
 * `area` has a Circle entry and a Shape fallback; `overlaps` dispatches on
 * both arguments, so `(Circle, Shape)` beats `(Shape, Shape)` for a circle
 * on the left but never applies with the circle on the right.
 */

import { Registry } from '../registry/registry.js';

export interface BoundingBox {
  width: number;
  height: number;
}

export abstract class Shape {
  abstract boundingBox(): BoundingBox;
}

export class Circle extends Shape {
  constructor(readonly radius: number) {
    super();
  }

  boundingBox(): BoundingBox {
    return { width: this.radius * 2, height: this.radius * 2 };
  }
}

export class Rectangle extends Shape {
  constructor(
    readonly width: number,
    readonly height: number
  ) {
    super();
  }

  boundingBox(): BoundingBox {
    return { width: this.width, height: this.height };
  }
}

export class Square extends Rectangle {
  constructor(readonly side: number) {
    super(side, side);
  }
}

export function areaOfCircle(circle: Circle): number {
  return Math.PI * circle.radius ** 2;
}

export function areaOfShape(shape: Shape): number {
  const box = shape.boundingBox();
  return box.width * box.height;
}

/**
 * Build a registry with `area` and `overlaps` entries.
 *
 * `overlaps` returns a description of which entry answered rather than a
 * geometric result.
 */
export function createShapeRegistry(): Registry<number | string> {
  const registry = new Registry<number | string>({ name: 'shapes' });

  registry.register('area', [Circle], areaOfCircle);
  registry.register('area', [Shape], areaOfShape);

  registry.register('overlaps', [Circle, Circle], () => 'circle-circle');
  registry.register('overlaps', [Circle, Shape], () => 'circle-shape');
  registry.register('overlaps', [Shape, Shape], () => 'shape-shape');

  return registry;
}
