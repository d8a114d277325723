import type { AssociationEntry, ErrorLeaf, ValidationNode } from "@/types/validation";
import { InvariantError } from "@/utils/errors/InvariantError";

function children(name: string, entry: AssociationEntry): ValidationNode[] {
  switch (entry.kind) {
    case "single":
      return [entry.node];
    case "many":
      return entry.nodes;
    default: {
      const unknown: never = entry;
      throw new InvariantError(
        `Association "${name}" is neither single nor many`,
        unknown,
      );
    }
  }
}

/**
 * Pulls every field error out of `node`.
 *
 * Leaves found inside an association are labelled with that association's
 * name only; the names of outer associations are dropped, so `comment`
 * nested under `posts` yields the prefix `comment`.
 */
export function flatten(node: ValidationNode, prefix?: string): ErrorLeaf[] {
  const leaves: ErrorLeaf[] = [];

  for (const [field, details] of Object.entries(node.fieldErrors)) {
    for (const detail of details) {
      if (typeof detail.template !== "string") {
        throw new InvariantError(`Error on "${field}" has no template`, detail);
      }
      leaves.push({
        ...(prefix ? { prefix } : {}),
        field,
        template: detail.template,
        bindings: detail.bindings,
      });
    }
  }

  for (const [name, entry] of Object.entries(node.associations)) {
    for (const child of children(name, entry)) {
      leaves.push(...flatten(child, name));
    }
  }

  return leaves;
}
