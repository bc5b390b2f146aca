/**
 * A named section of the usage text that arguments can be placed in.
 * Two groups are the same group when their names match.
 */
export class UsageGroup {
  constructor(public readonly name: string) {}

  equals(other: UsageGroup): boolean {
    return other.name === this.name;
  }

  toString(): string {
    return `UsageGroup(${this.name})`;
  }
}
