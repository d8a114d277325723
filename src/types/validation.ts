export type Binding = string | number | bigint | boolean | symbol;

export type Bindings = Record<string, Binding>;

/** One failed check on one field, e.g. `must be greater than %{number}`. */
export type ErrorDetail = {
  template: string;
  bindings: Bindings;
};

export type AssociationEntry =
  | { kind: "single"; node: ValidationNode }
  | { kind: "many"; nodes: ValidationNode[] };

/**
 * Validation result for one record. Nested records hang off `associations`
 * and are validated the same way, so the whole result is a finite tree.
 */
export type ValidationNode = {
  fieldErrors: Record<string, ErrorDetail[]>;
  associations: Record<string, AssociationEntry>;
};

export type RawError =
  | { kind: "message"; message: string }
  | { kind: "tree"; node: ValidationNode };

/** A field failure pulled out of a tree, not yet rendered. */
export type ErrorLeaf = {
  prefix?: string;
  field: string;
  template: string;
  bindings: Bindings;
};

export function message(text: string): RawError {
  return { kind: "message", message: text };
}

export function tree(node: ValidationNode): RawError {
  return { kind: "tree", node };
}

export function single(node: ValidationNode): AssociationEntry {
  return { kind: "single", node };
}

export function many(nodes: ValidationNode[]): AssociationEntry {
  return { kind: "many", nodes };
}

export function isValid(node: ValidationNode): boolean {
  if (Object.keys(node.fieldErrors).length > 0) return false;

  return Object.values(node.associations).every((entry) =>
    entry.kind === "single"
      ? isValid(entry.node)
      : entry.nodes.every((child) => isValid(child)),
  );
}
