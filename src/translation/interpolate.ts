import type { Binding, Bindings } from "@/types/validation";

const PLACEHOLDER = /%\{(\w+)\}/g;

function render(value: Binding): string {
  if (typeof value === "symbol") return value.description ?? "";
  return String(value);
}

/**
 * Replaces each `%{name}` in `template` with `bindings[name]`.
 * Unbound placeholders are kept as written.
 */
export function interpolate(template: string, bindings: Bindings): string {
  return template.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(bindings, name)
      ? render(bindings[name])
      : placeholder,
  );
}
