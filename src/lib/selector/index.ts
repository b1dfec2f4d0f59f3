/**
 * Weighted choice among operation kinds
 */

import { ConfigError } from "../../utils/errors.js";
import {
  OPERATION_KINDS,
  isOperationKind,
  type OperationKind,
  type OperationMix,
} from "../../types/workload.js";

export const DEFAULT_OPERATION_MIX: Readonly<OperationMix> = Object.freeze({
  find: 70,
  insert: 20,
  update: 10,
});

/**
 * Parse a mix such as `find=70,insert=20,update=10` (`:` also accepted).
 *
 * @throws ConfigError on unknown or repeated kinds and on weights that are
 * not finite non-negative numbers
 */
export function parseOperationMix(input: string): OperationMix {
  const parts = input
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  if (parts.length === 0) {
    throw new ConfigError("Operation mix is empty", { input });
  }

  const mix: OperationMix = {};
  for (const part of parts) {
    const match = /^([a-zA-Z_]+)\s*[=:]\s*(\S+)$/.exec(part);
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new ConfigError(`Malformed operation mix entry: "${part}"`, { input });
    }

    const kind = match[1].toLowerCase();
    if (!isOperationKind(kind)) {
      throw new ConfigError(
        `Unknown operation kind "${kind}". Expected one of: ${OPERATION_KINDS.join(", ")}`,
        { input },
      );
    }
    if (mix[kind] !== undefined) {
      throw new ConfigError(`Operation kind "${kind}" appears more than once`, { input });
    }

    mix[kind] = parseWeight(match[2], kind, input);
  }

  return mix;
}

function parseWeight(raw: string, kind: OperationKind, input: string): number {
  const weight = Number(raw);
  if (!Number.isFinite(weight) || weight < 0) {
    throw new ConfigError(`Weight for "${kind}" must be a non-negative number, got "${raw}"`, {
      input,
    });
  }
  return weight;
}

export function formatOperationMix(mix: OperationMix): string {
  return OPERATION_KINDS.filter((kind) => mix[kind] !== undefined)
    .map((kind) => `${kind}=${mix[kind]}`)
    .join(",");
}

/**
 * Draws operation kinds with long-run frequency equal to each kind's
 * normalized weight. Zero-weight kinds are excluded at construction.
 */
export class OperationSelector {
  private readonly kinds: OperationKind[] = [];
  private readonly cumulative: number[] = [];
  private readonly total: number;

  constructor(
    mix: OperationMix,
    private readonly random: () => number = Math.random,
  ) {
    let running = 0;
    for (const kind of OPERATION_KINDS) {
      const weight = mix[kind] ?? 0;
      if (!Number.isFinite(weight) || weight < 0) {
        throw new ConfigError(`Weight for "${kind}" must be a non-negative number`, {
          kind,
          weight,
        });
      }
      if (weight === 0) continue;
      running += weight;
      this.kinds.push(kind);
      this.cumulative.push(running);
    }

    if (running <= 0) {
      throw new ConfigError("Operation mix must give at least one kind a weight > 0", {
        mix,
      });
    }
    this.total = running;
  }

  select(): OperationKind {
    const draw = this.random() * this.total;

    // First bound strictly above the draw
    let lo = 0;
    let hi = this.cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const bound = this.cumulative[mid] ?? this.total;
      if (bound > draw) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }

    const kind = this.kinds[lo];
    if (kind === undefined) {
      throw new Error("Operation selector has no selectable kinds");
    }
    return kind;
  }

  probabilities(): Record<OperationKind, number> {
    const result: Record<OperationKind, number> = { find: 0, insert: 0, update: 0 };
    let previous = 0;
    this.kinds.forEach((kind, index) => {
      const bound = this.cumulative[index] ?? previous;
      result[kind] = (bound - previous) / this.total;
      previous = bound;
    });
    return result;
  }

  selectableKinds(): readonly OperationKind[] {
    return this.kinds;
  }
}
