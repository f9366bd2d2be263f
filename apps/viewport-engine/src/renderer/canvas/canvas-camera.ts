/**
 * Canvas Camera System
 *
 * Pan and zoom over an unbounded world using the camera model.
 * Items stay at fixed world positions while the viewport moves.
 *
 * Key concepts:
 * - Camera: {x, y, z} where x,y is the world-space origin (top-left of the
 *   visible world rectangle) and z is zoom (screen pixels per world unit)
 * - Screen coordinates: pixel positions in the viewport
 * - World coordinates: positions on the unbounded canvas
 *
 * The pure functions below never mutate their input. `CanvasCamera` holds the
 * live state and reports whether each operation actually changed it, so the
 * caller decides how to propagate the change.
 */

import { clamp, type Point, type Rect, type Size } from './geometry';

export interface CameraState {
  /** World-space X of the viewport's left edge */
  x: number;
  /** World-space Y of the viewport's top edge */
  y: number;
  /** Zoom level (1 = 100%, 0.5 = 50%, 2 = 200%) */
  z: number;
}

/**
 * Immutable camera snapshot captured at a specific point in time.
 *
 * Frames are assembled against a snapshot so screen rectangles stay
 * consistent even if the camera moves while a frame is being consumed.
 */
export interface CameraSnapshot {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  /** Timestamp when snapshot was captured */
  readonly timestamp: number;
}

export interface CameraConstraints {
  minZoom: number;
  maxZoom: number;
  /** Floor for screen-space width/height produced by worldRectToScreen */
  minScreenSize: number;
}

const DEFAULT_CONSTRAINTS: CameraConstraints = {
  minZoom: 0.1,
  maxZoom: 10,
  minScreenSize: 1,
};

/**
 * Convert a screen point to world coordinates
 */
export function screenToWorld(screen: Point, camera: CameraState): Point {
  return {
    x: camera.x + screen.x / camera.z,
    y: camera.y + screen.y / camera.z,
  };
}

/**
 * Convert a world point to screen coordinates
 */
export function worldToScreen(world: Point, camera: CameraState): Point {
  return {
    x: (world.x - camera.x) * camera.z,
    y: (world.y - camera.y) * camera.z,
  };
}

/**
 * Transform a world rectangle to screen space.
 *
 * Width and height are floored to `minScreenSize` so extreme zoom-out never
 * yields zero or negative rectangles.
 */
export function worldRectToScreen(
  rect: Rect,
  camera: CameraState,
  minScreenSize: number = DEFAULT_CONSTRAINTS.minScreenSize
): Rect {
  const topLeft = worldToScreen(rect, camera);
  return {
    x: topLeft.x,
    y: topLeft.y,
    width: Math.max(minScreenSize, rect.width * camera.z),
    height: Math.max(minScreenSize, rect.height * camera.z),
  };
}

/**
 * World-space rectangle covered by a viewport of the given pixel size
 */
export function getVisibleWorldRect(camera: CameraState, viewport: Size): Rect {
  return {
    x: camera.x,
    y: camera.y,
    width: viewport.width / camera.z,
    height: viewport.height / camera.z,
  };
}

/**
 * Pan by a world-space delta
 */
export function panCamera(camera: CameraState, dx: number, dy: number): CameraState {
  return { x: camera.x + dx, y: camera.y + dy, z: camera.z };
}

/**
 * Pan by a screen-space delta (drag gesture).
 *
 * The delta is divided by zoom so panning feels consistent at any zoom level.
 * Dragging right moves the content right, so the origin moves left.
 */
export function panCameraByScreen(camera: CameraState, dx: number, dy: number): CameraState {
  return {
    x: camera.x - dx / camera.z,
    y: camera.y - dy / camera.z,
    z: camera.z,
  };
}

/**
 * Zoom the camera toward a point
 *
 * The world point under `point` (screen coordinates) stays stationary.
 * Zoom is multiplicative and clamped; when the clamped zoom equals the current
 * zoom the same camera object is returned, so repeated zooming past a limit
 * never drifts the origin.
 *
 * @param factor Zoom multiplier (> 1 zooms in, < 1 zooms out)
 */
export function zoomCameraToPoint(
  camera: CameraState,
  point: Point,
  factor: number,
  constraints: CameraConstraints = DEFAULT_CONSTRAINTS
): CameraState {
  if (!Number.isFinite(factor) || factor <= 0) {
    return camera;
  }

  const newZoom = clamp(camera.z * factor, constraints.minZoom, constraints.maxZoom);
  if (newZoom === camera.z) {
    return camera;
  }

  // World point under the focal position before the zoom
  const before = screenToWorld(point, camera);
  // ...and where that screen position would land after it, origin unchanged
  const after = screenToWorld(point, { ...camera, z: newZoom });

  return {
    x: camera.x + (before.x - after.x),
    y: camera.y + (before.y - after.y),
    z: newZoom,
  };
}

/**
 * Place `worldPoint` at the center of the viewport
 */
export function centerOnPoint(camera: CameraState, worldPoint: Point, viewport: Size): CameraState {
  return {
    x: worldPoint.x - viewport.width / (2 * camera.z),
    y: worldPoint.y - viewport.height / (2 * camera.z),
    z: camera.z,
  };
}

/**
 * Fit a world rectangle in the viewport
 *
 * @param padding Padding around the rectangle (in screen pixels)
 */
export function fitRectInView(
  rect: Rect,
  viewport: Size,
  padding = 20,
  constraints: CameraConstraints = DEFAULT_CONSTRAINTS
): CameraState {
  const availableWidth = Math.max(1, viewport.width - padding * 2);
  const availableHeight = Math.max(1, viewport.height - padding * 2);

  // Degenerate rectangles (a single point) keep the highest zoom
  const scaleX = rect.width > 0 ? availableWidth / rect.width : constraints.maxZoom;
  const scaleY = rect.height > 0 ? availableHeight / rect.height : constraints.maxZoom;
  const zoom = clamp(Math.min(scaleX, scaleY), constraints.minZoom, constraints.maxZoom);

  return centerOnPoint(
    { x: 0, y: 0, z: zoom },
    { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 },
    viewport
  );
}

/**
 * Create an immutable camera snapshot from current camera state.
 */
export function createCameraSnapshot(camera: CameraState, timestamp: number = Date.now()): CameraSnapshot {
  return Object.freeze({
    x: camera.x,
    y: camera.y,
    z: camera.z,
    timestamp,
  });
}

function sameCamera(a: CameraState, b: CameraState): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

/**
 * Stateful camera with clamped zoom.
 *
 * Every mutator returns `true` only when the state actually changed.
 */
export class CanvasCamera {
  private state: CameraState;

  constructor(
    private readonly constraints: CameraConstraints = DEFAULT_CONSTRAINTS,
    origin: Point = { x: 0, y: 0 },
    zoom = 1
  ) {
    this.state = {
      x: origin.x,
      y: origin.y,
      z: clamp(zoom, constraints.minZoom, constraints.maxZoom),
    };
  }

  get origin(): Point {
    return { x: this.state.x, y: this.state.y };
  }

  get zoom(): number {
    return this.state.z;
  }

  getState(): CameraState {
    return { ...this.state };
  }

  snapshot(timestamp?: number): CameraSnapshot {
    return createCameraSnapshot(this.state, timestamp);
  }

  setState(origin: Point, zoom: number): boolean {
    if (!Number.isFinite(origin.x) || !Number.isFinite(origin.y) || !Number.isFinite(zoom)) {
      return false;
    }
    return this.apply({
      x: origin.x,
      y: origin.y,
      z: clamp(zoom, this.constraints.minZoom, this.constraints.maxZoom),
    });
  }

  /** Pan by a world-space delta */
  pan(delta: Point): boolean {
    if (!Number.isFinite(delta.x) || !Number.isFinite(delta.y)) return false;
    return this.apply(panCamera(this.state, delta.x, delta.y));
  }

  /** Pan by a screen-space delta */
  panByScreen(delta: Point): boolean {
    if (!Number.isFinite(delta.x) || !Number.isFinite(delta.y)) return false;
    return this.apply(panCameraByScreen(this.state, delta.x, delta.y));
  }

  /**
   * Zoom by `factor` keeping the world point under `focal` fixed on screen.
   * Without a focal point the viewport center is used.
   */
  zoomBy(factor: number, focal?: Point, viewport?: Size): boolean {
    const point = focal ?? (viewport ? { x: viewport.width / 2, y: viewport.height / 2 } : { x: 0, y: 0 });
    return this.apply(zoomCameraToPoint(this.state, point, factor, this.constraints));
  }

  centerOn(worldPoint: Point, viewport: Size): boolean {
    return this.apply(centerOnPoint(this.state, worldPoint, viewport));
  }

  fitRect(rect: Rect, viewport: Size, padding?: number): boolean {
    return this.apply(fitRectInView(rect, viewport, padding, this.constraints));
  }

  screenToWorld(point: Point): Point {
    return screenToWorld(point, this.state);
  }

  worldPointToScreen(point: Point): Point {
    return worldToScreen(point, this.state);
  }

  worldToScreen(rect: Rect): Rect {
    return worldRectToScreen(rect, this.state, this.constraints.minScreenSize);
  }

  visibleWorldRect(viewport: Size): Rect {
    return getVisibleWorldRect(this.state, viewport);
  }

  private apply(next: CameraState): boolean {
    if (sameCamera(next, this.state)) return false;
    this.state = { ...next };
    return true;
  }
}
