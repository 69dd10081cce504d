import { VariantError } from "./errors.js";
import type { Variant } from "./reader.js";

export type PathElement = { kind: "field"; name: string } | { kind: "index"; index: number };

const IDENTIFIER = /[^.[\]]+/y;
const INDEX = /\[(\d+)\]/y;
const QUOTED = /\["((?:[^"\\]|\\.)*)"\]/y;

const syntaxError = (text: string, at: number): VariantError =>
  new VariantError("InvalidValue", `Invalid path "${text}" at character ${at}`);

/**
 * Sequence of field and index steps into a nested value.
 *
 * Text form: `a.b[0]`, with `["any name"]` for names holding `.`, `[` or `]`.
 */
export class VariantPath {
  constructor(readonly elements: readonly PathElement[]) {}

  static parse(text: string): VariantPath {
    const elements: PathElement[] = [];
    let at = 0;
    let expectName = true;

    while (at < text.length) {
      if (!expectName && text[at] === ".") {
        at += 1;
        expectName = true;
        continue;
      }

      QUOTED.lastIndex = at;
      const quoted = QUOTED.exec(text);
      if (quoted) {
        elements.push({ kind: "field", name: quoted[1].replace(/\\(.)/g, "$1") });
        at = QUOTED.lastIndex;
        expectName = false;
        continue;
      }

      INDEX.lastIndex = at;
      const index = INDEX.exec(text);
      if (index) {
        elements.push({ kind: "index", index: Number(index[1]) });
        at = INDEX.lastIndex;
        expectName = false;
        continue;
      }

      IDENTIFIER.lastIndex = at;
      const name = expectName ? IDENTIFIER.exec(text) : null;
      if (!name) {
        throw syntaxError(text, at);
      }
      elements.push({ kind: "field", name: name[0] });
      at = IDENTIFIER.lastIndex;
      expectName = false;
    }

    if (expectName && elements.length > 0) {
      throw syntaxError(text, at);
    }
    return new VariantPath(elements);
  }

  field(name: string): VariantPath {
    return new VariantPath([...this.elements, { kind: "field", name }]);
  }

  index(index: number): VariantPath {
    return new VariantPath([...this.elements, { kind: "index", index }]);
  }

  toString(): string {
    return this.elements
      .map((element, position) => {
        if (element.kind === "index") return `[${element.index}]`;
        if (/^[^.[\]]+$/.test(element.name)) {
          return position === 0 ? element.name : `.${element.name}`;
        }
        return `["${element.name.replace(/["\\]/g, "\\$&")}"]`;
      })
      .join("");
  }
}

/**
 * Walks `path` from `variant`. A missing field, an index past the end, or a
 * step into a value of the wrong kind yields undefined.
 */
export const getPath = (variant: Variant, path: VariantPath | string): Variant | undefined => {
  const steps = typeof path === "string" ? VariantPath.parse(path).elements : path.elements;
  let current: Variant | undefined = variant;
  for (const step of steps) {
    if (!current) return undefined;
    const kind = current.kind();
    if (step.kind === "field") {
      current = kind === "object" ? current.asObject().get(step.name) : undefined;
    } else {
      current = kind === "array" ? current.asArray().get(step.index) : undefined;
    }
  }
  return current;
};
