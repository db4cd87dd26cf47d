import { GRADIENT_EPSILON } from "../constants";
import { create, invert, transformPoint, type Mat3 } from "../math/mat3";
import type { Vec2 } from "../math/vec2";

/**
 * A sample point and its four gradient neighbours, all in local space.
 * Neighbours sit at ±GRADIENT_EPSILON along each screen axis before projection.
 */
export interface LocalSamples {
  center: Vec2;
  xPlus: Vec2;
  xMinus: Vec2;
  yPlus: Vec2;
  yMinus: Vec2;
}

/**
 * Current local-to-screen transform and its inverse.
 * Screen samples are projected into local space through the inverse.
 */
export class TransformState {
  private matrix: Mat3 = create();
  private inverse: Mat3 = create();

  get current(): Mat3 {
    return this.matrix;
  }

  /** Replace the transform; a singular matrix leaves a non-finite inverse */
  set(matrix: Mat3): void {
    this.matrix = matrix;
    this.inverse = invert(matrix);
  }

  toLocal(screen: Readonly<Vec2>): Vec2 {
    return transformPoint(this.inverse, screen);
  }

  samples(screen: Readonly<Vec2>): LocalSamples {
    const [x, y] = screen;
    return {
      center: this.toLocal(screen),
      xPlus: this.toLocal([x + GRADIENT_EPSILON, y]),
      xMinus: this.toLocal([x - GRADIENT_EPSILON, y]),
      yPlus: this.toLocal([x, y + GRADIENT_EPSILON]),
      yMinus: this.toLocal([x, y - GRADIENT_EPSILON]),
    };
  }
}
