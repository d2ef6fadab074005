import type { ComponentTransform } from "../../ports/codec-options"

/**
 * Accumulates FlatText one complete pair at a time.
 *
 * Callers hand over a pair only once its value is known, so nothing written
 * ever has to be taken back.
 */
export class FlatTextWriter {
  private output = ""
  private isFirst = true
  private count = 0

  constructor(private readonly encodeComponent: ComponentTransform = (raw) => raw) {}

  write(key: string, value: string): void {
    if (!this.isFirst) this.output += "&"
    this.isFirst = false

    this.output += `${this.encodeComponent(key)}=${this.encodeComponent(value)}`
    this.count++
  }

  get pairs(): number {
    return this.count
  }

  toString(): string {
    return this.output
  }
}
