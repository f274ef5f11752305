/**
 * Hands out PostgreSQL positional placeholders (`$1`, `$2`, ...) for one
 * statement. A fresh sequence is used per statement.
 */
export class ParameterSequence {
  private parameterIndex = 0;

  next(): string {
    return `$${++this.parameterIndex}`;
  }
}
