import { ZodIssueCode, ZodParsedType, type ZodError, type ZodIssue } from "zod";
import type { Bindings, ErrorDetail, ValidationNode } from "@/types/validation";
import { InvariantError } from "@/utils/errors/InvariantError";

export const BASE_FIELD = "base";

const detail = (template: string, bindings: Bindings = {}): ErrorDetail => ({
  template,
  bindings,
});

function tooSmall(issue: Extract<ZodIssue, { code: "too_small" }>) {
  const count = { count: issue.minimum };
  switch (issue.type) {
    case "string":
      if (issue.exact) return detail("should be %{count} character(s)", count);
      // an empty required string reads the same as a missing one
      return issue.minimum === 1
        ? detail("can't be blank")
        : detail("should be at least %{count} character(s)", count);
    case "array":
    case "set":
      return issue.exact
        ? detail("should have %{count} item(s)", count)
        : detail("should have at least %{count} item(s)", count);
    case "number":
    case "bigint":
      return issue.inclusive
        ? detail("must be greater than or equal to %{number}", {
            number: issue.minimum,
          })
        : detail("must be greater than %{number}", { number: issue.minimum });
    default:
      return detail(issue.message);
  }
}

function tooBig(issue: Extract<ZodIssue, { code: "too_big" }>) {
  const count = { count: issue.maximum };
  switch (issue.type) {
    case "string":
      return issue.exact
        ? detail("should be %{count} character(s)", count)
        : detail("should be at most %{count} character(s)", count);
    case "array":
    case "set":
      return issue.exact
        ? detail("should have %{count} item(s)", count)
        : detail("should have at most %{count} item(s)", count);
    case "number":
    case "bigint":
      return issue.inclusive
        ? detail("must be less than or equal to %{number}", {
            number: issue.maximum,
          })
        : detail("must be less than %{number}", { number: issue.maximum });
    default:
      return detail(issue.message);
  }
}

export function toErrorDetail(issue: ZodIssue): ErrorDetail {
  switch (issue.code) {
    case ZodIssueCode.invalid_type:
      return issue.received === ZodParsedType.undefined ||
        issue.received === ZodParsedType.null
        ? detail("can't be blank")
        : detail("is invalid");
    case ZodIssueCode.too_small:
      return tooSmall(issue);
    case ZodIssueCode.too_big:
      return tooBig(issue);
    case ZodIssueCode.invalid_string:
      return detail("has invalid format");
    case ZodIssueCode.invalid_enum_value:
    case ZodIssueCode.invalid_literal:
    case ZodIssueCode.invalid_union:
      return detail("is invalid");
    default:
      return detail(issue.message);
  }
}

type NodeBuilder = {
  fieldErrors: Map<string, ErrorDetail[]>;
  associations: Map<string, AssociationBuilder>;
};

type AssociationBuilder =
  | { kind: "single"; node: NodeBuilder }
  | { kind: "many"; nodes: Map<number, NodeBuilder> };

const newBuilder = (): NodeBuilder => ({
  fieldErrors: new Map(),
  associations: new Map(),
});

function singleChild(parent: NodeBuilder, name: string): NodeBuilder {
  const entry = parent.associations.get(name);
  if (!entry) {
    const node = newBuilder();
    parent.associations.set(name, { kind: "single", node });
    return node;
  }
  if (entry.kind !== "single") {
    throw new InvariantError(`"${name}" is reported both as list and object`);
  }
  return entry.node;
}

function manyChild(
  parent: NodeBuilder,
  name: string,
  index: number,
): NodeBuilder {
  let entry = parent.associations.get(name);
  if (!entry) {
    entry = { kind: "many", nodes: new Map() };
    parent.associations.set(name, entry);
  }
  if (entry.kind !== "many") {
    throw new InvariantError(`"${name}" is reported both as object and list`);
  }
  let node = entry.nodes.get(index);
  if (!node) {
    node = newBuilder();
    entry.nodes.set(index, node);
  }
  return node;
}

function place(root: NodeBuilder, path: (string | number)[]) {
  let node = root;
  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    if (typeof segment === "number") continue;

    const rest = path.slice(i + 1);
    if (rest.every((s) => typeof s === "number")) {
      return { node, field: segment };
    }

    const next = path[i + 1];
    if (typeof next === "number") {
      node = manyChild(node, segment, next);
      i++;
    } else {
      node = singleChild(node, segment);
    }
  }
  return { node, field: BASE_FIELD };
}

function build(builder: NodeBuilder): ValidationNode {
  const node: ValidationNode = {
    fieldErrors: Object.fromEntries(builder.fieldErrors),
    associations: {},
  };
  for (const [name, entry] of builder.associations) {
    node.associations[name] =
      entry.kind === "single"
        ? { kind: "single", node: build(entry.node) }
        : {
            kind: "many",
            nodes: [...entry.nodes.entries()]
              .sort(([a], [b]) => a - b)
              .map(([, child]) => build(child)),
          };
  }
  return node;
}

/**
 * Turns the issues of a failed zod parse into a validation tree. A name
 * followed by an index is a list association, a name followed by a name is
 * a single association, and the last name is the failing field.
 */
export function toValidationNode(error: ZodError): ValidationNode {
  const root = newBuilder();

  for (const issue of error.issues) {
    const { node, field } = place(root, issue.path);
    const details = node.fieldErrors.get(field) ?? [];
    details.push(toErrorDetail(issue));
    node.fieldErrors.set(field, details);
  }

  return build(root);
}
