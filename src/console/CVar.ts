import { simLogError } from "../core/simLog.js";

export type CVarValue = number | boolean | string;
export type CVarType = "number" | "boolean" | "string";
export type CVarCategory = "cl" | "sv" | "r" | "fun";

interface CVarDescBase<T extends CVarValue> {
  name: string;
  description: string;
  defaultValue: T;
  category: CVarCategory;
}

export interface NumberCVarDesc extends CVarDescBase<number> {
  type: "number";
  min?: number;
  max?: number;
}

export interface BooleanCVarDesc extends CVarDescBase<boolean> {
  type: "boolean";
}

export interface StringCVarDesc extends CVarDescBase<string> {
  type: "string";
}

export type CVarDesc = NumberCVarDesc | BooleanCVarDesc | StringCVarDesc;

export abstract class CVar<T extends CVarValue> {
  readonly name: string;
  readonly description: string;
  abstract readonly type: CVarType;
  readonly defaultValue: T;
  readonly category: CVarCategory;
  private value: T;
  private listeners = new Set<(newVal: T, oldVal: T) => void>();

  constructor(desc: CVarDescBase<T>) {
    this.name = desc.name;
    this.description = desc.description;
    this.defaultValue = desc.defaultValue;
    this.category = desc.category;
    this.value = desc.defaultValue;
  }

  get(): T {
    return this.value;
  }

  set(raw: T): void {
    const v = this.normalize(raw);
    if (v === this.value) return;
    const old = this.value;
    this.value = v;
    for (const cb of this.listeners) {
      try {
        cb(v, old);
      } catch (e) {
        simLogError(`[cvar] onChange error for ${this.name}`, e);
      }
    }
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: T, oldVal: T) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Parse console input into the cvar's type and set it. Unparseable input is ignored. */
  setFromString(str: string): void {
    const parsed = this.parse(str);
    if (parsed !== undefined) this.set(parsed);
  }

  toString(): string {
    return `${this.name} = ${String(this.value)} (default: ${String(this.defaultValue)}) -- ${this.description}`;
  }

  protected normalize(v: T): T {
    return v;
  }

  protected abstract parse(str: string): T | undefined;
}

export class NumberCVar extends CVar<number> {
  readonly type = "number";
  readonly min: number | undefined;
  readonly max: number | undefined;

  constructor(desc: NumberCVarDesc) {
    super(desc);
    this.min = desc.min;
    this.max = desc.max;
  }

  protected override normalize(v: number): number {
    let out = v;
    if (this.min != null) out = Math.max(this.min, out);
    if (this.max != null) out = Math.min(this.max, out);
    return out;
  }

  protected parse(str: string): number | undefined {
    const n = Number(str);
    return Number.isNaN(n) ? undefined : n;
  }
}

export class BooleanCVar extends CVar<boolean> {
  readonly type = "boolean";

  protected parse(str: string): boolean {
    return str === "1" || str === "true";
  }
}

export class StringCVar extends CVar<string> {
  readonly type = "string";

  protected parse(str: string): string {
    return str;
  }
}

export type AnyCVar = NumberCVar | BooleanCVar | StringCVar;
