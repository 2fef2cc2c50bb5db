import type { Directive, Instruction, Program } from '../x86/types.js';

/**
 * Append-only directive log for one compilation unit.
 */
export class DirectiveLog {
  private entries: Directive[] = [];

  directive(d: Directive): void {
    this.entries.push(d);
  }

  emit(ins: Instruction): void {
    this.entries.push({ kind: 'ins', ins });
  }

  /** Clear the log; call before generating each unit. */
  reset(): void {
    this.entries = [];
  }

  /** Snapshot of the log in emission order. Does not clear it. */
  flush(): Program {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }
}
