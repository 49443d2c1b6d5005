import {
  type AnyCVar,
  type BooleanCVarDesc,
  BooleanCVar,
  type CVarCategory,
  type CVarDesc,
  type NumberCVarDesc,
  NumberCVar,
  type StringCVarDesc,
  StringCVar,
} from "./CVar.js";

function createCVar(desc: CVarDesc): AnyCVar {
  switch (desc.type) {
    case "number":
      return new NumberCVar(desc);
    case "boolean":
      return new BooleanCVar(desc);
    case "string":
      return new StringCVar(desc);
  }
}

export class CVarRegistry {
  private cvars = new Map<string, AnyCVar>();

  register(desc: NumberCVarDesc): NumberCVar;
  register(desc: BooleanCVarDesc): BooleanCVar;
  register(desc: StringCVarDesc): StringCVar;
  register(desc: CVarDesc): AnyCVar {
    if (this.cvars.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    const cv = createCVar(desc);
    this.cvars.set(desc.name, cv);
    return cv;
  }

  get(name: string): AnyCVar | undefined {
    return this.cvars.get(name);
  }

  getAll(): AnyCVar[] {
    return [...this.cvars.values()];
  }

  getByCategory(category: CVarCategory): AnyCVar[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  getNames(): string[] {
    return [...this.cvars.keys()];
  }

  resetAll(): void {
    for (const cv of this.cvars.values()) cv.reset();
  }

  /** Apply a `name value` console line. Returns false for unknown names. */
  execute(line: string): boolean {
    const [name, ...rest] = line.trim().split(/\s+/);
    const cv = name ? this.cvars.get(name) : undefined;
    if (!cv) return false;
    if (rest.length > 0) cv.setFromString(rest.join(" "));
    return true;
  }
}
