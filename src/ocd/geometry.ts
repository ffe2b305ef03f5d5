import type { Georeferencing, MapPointF } from '../map-types.js';

/** Axis-aligned rectangle; y grows downwards like map coordinates. */
export interface Rect {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

export function rectFromPoint(x: number, y: number): Rect {
    return { left: x, top: y, right: x, bottom: y };
}

/** Extends `rect` to include the point, treating `null` as the empty rectangle. */
export function rectInclude(rect: Rect | null, x: number, y: number): Rect {
    if (!rect) return rectFromPoint(x, y);
    return {
        left: Math.min(rect.left, x),
        top: Math.min(rect.top, y),
        right: Math.max(rect.right, x),
        bottom: Math.max(rect.bottom, y),
    };
}

export function rectUnite(a: Rect | null, b: Rect | null): Rect | null {
    if (!a) return b;
    if (!b) return a;
    return {
        left: Math.min(a.left, b.left),
        top: Math.min(a.top, b.top),
        right: Math.max(a.right, b.right),
        bottom: Math.max(a.bottom, b.bottom),
    };
}

export function rectGrow(rect: Rect, margin: number): Rect {
    return {
        left: rect.left - margin,
        top: rect.top - margin,
        right: rect.right + margin,
        bottom: rect.bottom + margin,
    };
}

export function rectWidth(rect: Rect): number {
    return rect.right - rect.left;
}

export function rectHeight(rect: Rect): number {
    return rect.bottom - rect.top;
}

export function rectCenter(rect: Rect): MapPointF {
    return { x: (rect.left + rect.right) / 2, y: (rect.top + rect.bottom) / 2 };
}

export function rectContains(outer: Rect, inner: Rect): boolean {
    return inner.left >= outer.left && inner.right <= outer.right
        && inner.top >= outer.top && inner.bottom <= outer.bottom;
}

export function rectIntersects(a: Rect, b: Rect): boolean {
    return a.left < b.right && b.left < a.right && a.top < b.bottom && b.top < a.bottom;
}

/**
 * 2D affine transform: x' = m11*x + m21*y + dx, y' = m12*x + m22*y + dy.
 */
export class Transform {
    constructor(
        public readonly m11: number = 1,
        public readonly m12: number = 0,
        public readonly m21: number = 0,
        public readonly m22: number = 1,
        public readonly dx: number = 0,
        public readonly dy: number = 0
    ) { }

    map(p: MapPointF): MapPointF {
        return {
            x: this.m11 * p.x + this.m21 * p.y + this.dx,
            y: this.m12 * p.x + this.m22 * p.y + this.dy,
        };
    }

    /** Returns `this * other`: `other` is applied first. */
    private compose(other: Transform): Transform {
        return new Transform(
            this.m11 * other.m11 + this.m21 * other.m12,
            this.m12 * other.m11 + this.m22 * other.m12,
            this.m11 * other.m21 + this.m21 * other.m22,
            this.m12 * other.m21 + this.m22 * other.m22,
            this.m11 * other.dx + this.m21 * other.dy + this.dx,
            this.m12 * other.dx + this.m22 * other.dy + this.dy
        );
    }

    translate(dx: number, dy: number): Transform {
        return this.compose(new Transform(1, 0, 0, 1, dx, dy));
    }

    rotate(degrees: number): Transform {
        if (degrees === 0) return this;
        const a = degrees * Math.PI / 180;
        const cos = Math.cos(a);
        const sin = Math.sin(a);
        return this.compose(new Transform(cos, sin, -sin, cos, 0, 0));
    }

    scale(sx: number, sy: number): Transform {
        return this.compose(new Transform(sx, 0, 0, sy, 0, 0));
    }

    inverted(): Transform {
        const det = this.m11 * this.m22 - this.m12 * this.m21;
        if (det === 0) return new Transform();
        const m11 = this.m22 / det;
        const m12 = -this.m12 / det;
        const m21 = -this.m21 / det;
        const m22 = this.m11 / det;
        return new Transform(
            m11, m12, m21, m22,
            -(m11 * this.dx + m21 * this.dy),
            -(m12 * this.dx + m22 * this.dy)
        );
    }
}

// --- GEOREFERENCING ---

function mapRefPoint(georef: Georeferencing): MapPointF {
    return georef.mapRefPoint ?? { x: 0, y: 0 };
}

/**
 * Converts a map position in millimetres to projected coordinates in metres.
 * Map y grows downwards, projected y grows northwards.
 */
export function toProjectedCoords(georef: Georeferencing, p: MapPointF): MapPointF {
    const ref = mapRefPoint(georef);
    const f = georef.scaleDenominator / 1000;
    const dx = (p.x - ref.x) * f;
    const dy = -(p.y - ref.y) * f;
    const g = georef.grivation * Math.PI / 180;
    const cos = Math.cos(g);
    const sin = Math.sin(g);
    return {
        x: georef.projectedRefPoint.x + dx * cos - dy * sin,
        y: georef.projectedRefPoint.y + dx * sin + dy * cos,
    };
}

/** Inverse of {@link toProjectedCoords}. */
export function toMapCoordF(georef: Georeferencing, p: MapPointF): MapPointF {
    const ref = mapRefPoint(georef);
    const f = georef.scaleDenominator / 1000;
    const px = p.x - georef.projectedRefPoint.x;
    const py = p.y - georef.projectedRefPoint.y;
    const g = georef.grivation * Math.PI / 180;
    const cos = Math.cos(g);
    const sin = Math.sin(g);
    const dx = px * cos + py * sin;
    const dy = -px * sin + py * cos;
    return { x: ref.x + dx / f, y: ref.y - dy / f };
}
