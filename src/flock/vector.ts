import type { Vector2 } from "./vocabulary/schemas/primitives";

export function add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function multiply(v: Vector2, scalar: number): Vector2 {
  return { x: v.x * scalar, y: v.y * scalar };
}

export function divide(v: Vector2, scalar: number): Vector2 {
  if (scalar === 0) return { x: 0, y: 0 };
  return { x: v.x / scalar, y: v.y / scalar };
}

export function dot(a: Vector2, b: Vector2): number {
  return a.x * b.x + a.y * b.y;
}

export function magnitudeSquared(v: Vector2): number {
  return v.x * v.x + v.y * v.y;
}

export function magnitude(v: Vector2): number {
  return Math.sqrt(magnitudeSquared(v));
}

/**
 * Unit vector in the direction of v; the zero vector stays zero
 */
export function normalize(v: Vector2): Vector2 {
  const mag = magnitude(v);
  if (mag === 0) return { x: 0, y: 0 };
  return divide(v, mag);
}

/**
 * Clamp a vector to a maximum length
 */
export function limit(v: Vector2, max: number): Vector2 {
  if (max <= 0) return { x: 0, y: 0 };
  const magSq = magnitudeSquared(v);
  if (magSq > max * max) {
    return multiply(normalize(v), max);
  }
  return { x: v.x, y: v.y };
}

export function distanceSquared(a: Vector2, b: Vector2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function distance(a: Vector2, b: Vector2): number {
  return Math.sqrt(distanceSquared(a, b));
}

export function setMagnitude(v: Vector2, mag: number): Vector2 {
  return multiply(normalize(v), mag);
}

export function isFiniteVector(v: Vector2): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y);
}
