/**
 * Best-effort cost extraction from free-form agent output.
 *
 * The agent gives no format guarantee, so this looks for the last
 * "cost: $0.05" / "Cost 1.2" style mention and treats anything else as
 * no data. Never rely on it for accounting.
 */

const COST_PATTERN = /cost[:\s]+\$?(\d+(?:\.\d*)?)/gi;

/**
 * Return the last cost figure found in `output`, or undefined.
 */
export function parseCost(output: string): number | undefined {
  let last: number | undefined;

  for (const match of output.matchAll(COST_PATTERN)) {
    const value = Number.parseFloat(match[1]);
    if (Number.isFinite(value)) {
      last = value;
    }
  }

  return last;
}
