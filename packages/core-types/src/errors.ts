export type PricingErrorKind =
  | "InvalidArgument"
  | "EmptyData"
  | "InsufficientData"
  | "OutOfRange"
  | "MissingGridPoint"
  | "Unconfigured"
  | "Unsupported";

export class PricingError extends Error {
  readonly kind: PricingErrorKind;

  constructor(kind: PricingErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = `${kind}Error`;
  }
}

export class InvalidArgumentError extends PricingError {
  constructor(message: string) {
    super("InvalidArgument", message);
  }
}

export class EmptyDataError extends PricingError {
  constructor(message: string) {
    super("EmptyData", message);
  }
}

export class InsufficientDataError extends PricingError {
  constructor(message: string) {
    super("InsufficientData", message);
  }
}

export type SurfaceAxis = "strike" | "maturity";

export class OutOfRangeError extends PricingError {
  readonly axis: SurfaceAxis;
  readonly value: number;

  constructor(axis: SurfaceAxis, value: number, min: number, max: number) {
    super("OutOfRange", `${axis} ${value} outside known range [${min}, ${max}]`);
    this.axis = axis;
    this.value = value;
  }
}

export class MissingGridPointError extends PricingError {
  readonly strike: number;
  readonly maturity: number;

  constructor(strike: number, maturity: number) {
    super("MissingGridPoint", `Missing volatility point at (K=${strike}, T=${maturity})`);
    this.strike = strike;
    this.maturity = maturity;
  }
}

export class UnconfiguredError extends PricingError {
  constructor(message: string) {
    super("Unconfigured", message);
  }
}

export class UnsupportedError extends PricingError {
  constructor(message: string) {
    super("Unsupported", message);
  }
}

export function isPricingError(err: unknown): err is PricingError {
  return err instanceof PricingError;
}
