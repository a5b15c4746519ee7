/**
 * Perceptual color space utilities
 * sRGB -> XYZ (D65) -> CIE Lab, and Euclidean Delta E (CIE76) in Lab
 */

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

export interface XYZ {
    x: number;
    y: number;
    z: number;
}

/**
 * CIE Lab color; l in [0, 100]
 */
export interface Lab {
    l: number;
    a: number;
    b: number;
}

// D65 reference white
const XN = 0.95047;
const YN = 1.0;
const ZN = 1.08883;

const EPSILON = 216.0 / 24389.0;
const KAPPA = 24389.0 / 27.0;

/**
 * Removes the sRGB transfer curve from a 0-255 component
 * @param value - Gamma-encoded channel value
 * @returns Linear intensity in [0, 1]
 */
function srgbToLinear(value: number): number {
    const normalized = value / 255.0;
    if (normalized <= 0.04045) {
        return normalized / 12.92;
    }
    return Math.pow((normalized + 0.055) / 1.055, 2.4);
}

function labF(t: number): number {
    return t > EPSILON ? Math.cbrt(t) : (KAPPA * t + 16.0) / 116.0;
}

/**
 * Converts RGB to XYZ using D65 illuminant
 * @param rgb - RGB color (0-255 range)
 * @returns XYZ color
 */
export function rgbToXyz(rgb: RGB): XYZ {
    const r = srgbToLinear(rgb.r);
    const g = srgbToLinear(rgb.g);
    const b = srgbToLinear(rgb.b);

    return {
        x: r * 0.4124564 + g * 0.3575761 + b * 0.1804375,
        y: r * 0.2126729 + g * 0.7151522 + b * 0.072175,
        z: r * 0.0193339 + g * 0.119192 + b * 0.9503041,
    };
}

/**
 * Converts XYZ to CIE Lab relative to the D65 white point
 * @param xyz - XYZ color
 * @returns Lab color
 */
export function xyzToLab(xyz: XYZ): Lab {
    const fx = labF(xyz.x / XN);
    const fy = labF(xyz.y / YN);
    const fz = labF(xyz.z / ZN);

    return {
        l: 116.0 * fy - 16.0,
        a: 500.0 * (fx - fy),
        b: 200.0 * (fy - fz),
    };
}

/**
 * Converts RGB directly to Lab
 * @param rgb - RGB color (0-255 range)
 * @returns Lab color
 */
export function rgbToLab(rgb: RGB): Lab {
    return xyzToLab(rgbToXyz(rgb));
}

/**
 * Euclidean distance in Lab (Delta E CIE76)
 * @param lab1 - First Lab color
 * @param lab2 - Second Lab color
 * @returns 0 for identical colors, larger is less similar
 */
export function deltaE76(lab1: Lab, lab2: Lab): number {
    const dl = lab1.l - lab2.l;
    const da = lab1.a - lab2.a;
    const db = lab1.b - lab2.b;
    return Math.sqrt(dl * dl + da * da + db * db);
}

/**
 * Parses "#RRGGBB" or "RRGGBB"
 * @param hex - Hex string, leading "#" optional
 * @returns null when the string is not a 6-digit hex color
 */
export function hexToRgb(hex: string): RGB | null {
    const cleaned = hex.replace(/^#/, "");
    if (!/^[0-9a-fA-F]{6}$/.test(cleaned)) {
        return null;
    }
    return {
        r: parseInt(cleaned.substring(0, 2), 16),
        g: parseInt(cleaned.substring(2, 4), 16),
        b: parseInt(cleaned.substring(4, 6), 16),
    };
}

/**
 * Formats a color as uppercase "#RRGGBB", clamping and rounding each channel
 */
export function rgbToHex(rgb: RGB): string {
    return `#${[rgb.r, rgb.g, rgb.b]
        .map((val) => Math.max(0, Math.min(255, Math.round(val))).toString(16).padStart(2, "0"))
        .join("")
        .toUpperCase()}`;
}
