import { InvalidArgumentError } from "core-types";

export function assertFinite(x: number, tag: string): void {
  if (!Number.isFinite(x)) {
    throw new InvalidArgumentError(`Non-finite value at ${tag}: ${x}`);
  }
}

export function assertPositive(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x <= 0) {
    throw new InvalidArgumentError(`Non-positive value at ${tag}: ${x}`);
  }
}

export function assertNonNegative(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x < 0) {
    throw new InvalidArgumentError(`Negative value at ${tag}: ${x}`);
  }
}
