export type Complex = {
  readonly re: number;
  readonly im: number;
};

export const ZERO: Complex = { re: 0, im: 0 };
export const I: Complex = { re: 0, im: 1 };

export function add(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function sub(a: Complex, b: Complex): Complex {
  return { re: a.re - b.re, im: a.im - b.im };
}

// Full product, so infinities turn into NaN the same way on every path.
export function mul(a: Complex, b: Complex): Complex {
  return {
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  };
}

export function scale(a: Complex, k: number): Complex {
  return { re: a.re * k, im: a.im * k };
}

export function norm(a: Complex): number {
  return Math.hypot(a.re, a.im);
}
