import { MathUtils, Matrix4 as ThreeMatrix4, Vector3 } from 'three';
import type { Axis, Matrix4, Vec3 } from '../types/scene';

const DEFAULT_EPSILON = 1e-9;

export const toThreeMatrix = (matrix: Matrix4): ThreeMatrix4 => new ThreeMatrix4().fromArray(matrix);

export const fromThreeMatrix = (matrix: ThreeMatrix4): Matrix4 => [...matrix.elements];

export const identityMatrix = (): Matrix4 => fromThreeMatrix(new ThreeMatrix4());

export const translationMatrix = (x: number, y: number, z: number): Matrix4 =>
  fromThreeMatrix(new ThreeMatrix4().makeTranslation(x, y, z));

export const rotationMatrix = (axis: Axis, degrees: number): Matrix4 => {
  const radians = MathUtils.degToRad(degrees);
  const matrix = new ThreeMatrix4();
  switch (axis) {
    case 'x':
      matrix.makeRotationX(radians);
      break;
    case 'y':
      matrix.makeRotationY(radians);
      break;
    case 'z':
      matrix.makeRotationZ(radians);
      break;
  }
  return fromThreeMatrix(matrix);
};

/** `a * b`: `b` expressed in the space of `a`. */
export const multiplyMatrices = (a: Matrix4, b: Matrix4): Matrix4 =>
  fromThreeMatrix(new ThreeMatrix4().multiplyMatrices(toThreeMatrix(a), toThreeMatrix(b)));

export const invertMatrix = (matrix: Matrix4): Matrix4 => fromThreeMatrix(toThreeMatrix(matrix).invert());

export const matrixTranslation = (matrix: Matrix4): Vec3 => {
  const position = new Vector3().setFromMatrixPosition(toThreeMatrix(matrix));
  return [position.x, position.y, position.z];
};

export const withTranslation = (matrix: Matrix4, translation: Vec3): Matrix4 => {
  const out = [...matrix];
  out[12] = translation[0];
  out[13] = translation[1];
  out[14] = translation[2];
  return out;
};

const axisIndex = (axis: Axis): number => (axis === 'x' ? 0 : axis === 'y' ? 1 : 2);

export const axisVector = (axis: Axis, length = 1): Vec3 => {
  const out: Vec3 = [0, 0, 0];
  out[axisIndex(axis)] = length;
  return out;
};

/** World matrix of a point `distance` along `matrix`'s local `axis`, keeping its orientation. */
export const offsetAlongLocalAxis = (matrix: Matrix4, axis: Axis, distance: number): Matrix4 => {
  const [x, y, z] = axisVector(axis, distance);
  return multiplyMatrices(matrix, translationMatrix(x, y, z));
};

/** Transform of `child` relative to `parent` (both world space). */
export const relativeMatrix = (parent: Matrix4, child: Matrix4): Matrix4 =>
  multiplyMatrices(invertMatrix(parent), child);

export const matricesEqual = (a: Matrix4, b: Matrix4, epsilon = DEFAULT_EPSILON): boolean =>
  a.length === b.length && a.every((value, index) => Math.abs(value - b[index]) <= epsilon);

export const vectorsEqual = (a: Vec3, b: Vec3, epsilon = DEFAULT_EPSILON): boolean =>
  a.every((value, index) => Math.abs(value - b[index]) <= epsilon);
