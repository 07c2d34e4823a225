/**
 * Vector Types
 *
 * Plain float 2D vectors. Every helper returns a new vector and leaves its
 * inputs untouched, so components can hold vectors by value.
 */

// ============================================
// 2D Vector
// ============================================

export interface Vec2 {
    x: number;
    y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Zero(): Vec2 {
    return { x: 0, y: 0 };
}

export function vec2Splat(v: number): Vec2 {
    return { x: v, y: v };
}

export function vec2Clone(v: Vec2): Vec2 {
    return { x: v.x, y: v.y };
}

export function vec2Add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

/** Component-wise product */
export function vec2Mul(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x * b.x, y: a.y * b.y };
}

export function vec2Div(v: Vec2, s: number): Vec2 {
    return { x: v.x / s, y: v.y / s };
}

export function vec2Abs(v: Vec2): Vec2 {
    return { x: Math.abs(v.x), y: Math.abs(v.y) };
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vec2): number {
    return Math.sqrt(vec2LengthSq(v));
}

/**
 * Scale a vector down so its length is at most `max`.
 * Direction is preserved; shorter vectors are returned unchanged.
 */
export function vec2ClampLength(v: Vec2, max: number): Vec2 {
    const lenSq = vec2LengthSq(v);
    if (lenSq <= max * max) return vec2Clone(v);
    return vec2Scale(vec2Div(v, Math.sqrt(lenSq)), max);
}

export function vec2Lerp(a: Vec2, b: Vec2, t: number): Vec2 {
    return {
        x: a.x + (b.x - a.x) * t,
        y: a.y + (b.y - a.y) * t
    };
}

/**
 * Sign of a number where zero counts as positive: +0 maps to 1, -0 to -1.
 * Math.sign would return 0 and collapse a push along an axis with no offset.
 */
export function signum(v: number): number {
    if (Number.isNaN(v)) return NaN;
    return v < 0 || Object.is(v, -0) ? -1 : 1;
}

export function vec2Signum(v: Vec2): Vec2 {
    return { x: signum(v.x), y: signum(v.y) };
}
