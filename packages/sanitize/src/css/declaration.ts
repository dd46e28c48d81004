import postcss, { type Container, type Declaration } from "postcss";

/** One property of a declaration block, as seen by hooks */
export interface StyleProperty {
  readonly name: string;
  readonly value: string;
  readonly important: boolean;
}

/** postcss leaves `important` unset when there is no `!important` */
export function toStyleProperty(decl: Declaration): StyleProperty {
  return { name: decl.prop, value: decl.value, important: decl.important === true };
}

/**
 * Ordered property list over the declarations of a postcss container: an
 * inline `style` attribute, a style rule, a page/margin rule, a keyframe or a
 * descriptor block such as `@font-face`. Names compare case-insensitively.
 */
export class StyleDeclaration {
  constructor(private readonly container: Container) {}

  get length(): number {
    return this.declarations().length;
  }

  /** Snapshot of the current properties in source order */
  properties(): StyleProperty[] {
    return this.declarations().map(toStyleProperty);
  }

  getPropertyValue(name: string): string {
    const matches = this.find(name);
    return matches[matches.length - 1]?.value ?? "";
  }

  /**
   * Update the value of an existing property in place, or append it.
   * When `important` is omitted an existing flag is kept.
   */
  setProperty(name: string, value: string, important?: boolean): void {
    const [existing] = this.find(name);
    if (existing === undefined) {
      this.container.append(postcss.decl({ prop: name, value, important: important ?? false }));
      return;
    }
    existing.value = value;
    if (important !== undefined) existing.important = important;
  }

  /** Remove every declaration of `name`; returns the last removed value */
  removeProperty(name: string): string {
    const matches = this.find(name);
    for (const decl of matches) {
      decl.remove();
    }
    return matches[matches.length - 1]?.value ?? "";
  }

  /** Canonical text: `name: value; name2: value2 !important` */
  toCss(): string {
    return this.declarations()
      .map((decl) => `${decl.prop}: ${decl.value}${decl.important ? " !important" : ""}`)
      .join("; ");
  }

  /** The declaration nodes themselves, duplicates and escaped names included */
  declarations(): Declaration[] {
    const result: Declaration[] = [];
    for (const node of this.container.nodes ?? []) {
      if (node.type === "decl") result.push(node);
    }
    return result;
  }

  private find(name: string): Declaration[] {
    const wanted = name.toLowerCase();
    return this.declarations().filter((decl) => decl.prop.toLowerCase() === wanted);
  }
}
