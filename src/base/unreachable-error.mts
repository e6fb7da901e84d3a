export class UnreachableError extends Error {
  constructor(value: never) {
    super(`Unreachable code with specified value: ${String(value)}`);
    this.name = "UnreachableError";
  }
}
