// packages/core/src/config/FormatRegistry.ts
import { FormatDescriptor } from "../types/index.js";
import { VersionError } from "../errors/index.js";
import { DEFAULT_VERSION } from "../header/constants.js";

export class FormatRegistry {
  private static readonly byVersion = new Map<string, FormatDescriptor>();

  static register(f: FormatDescriptor): void {
    if (this.byVersion.has(f.version)) throw new VersionError(`Format ${f.version} already registered`);
    this.byVersion.set(f.version, f);
  }
  static get(version: string): FormatDescriptor {
    const f = this.byVersion.get(version);
    if (!f) throw new VersionError(`Unknown format version: ${version}`);
    return f;
  }
  static has(version: string): boolean { return this.byVersion.has(version); }
  static list(): FormatDescriptor[] { return [...this.byVersion.values()]; }
  // generation this software writes by default
  static get current(): FormatDescriptor { return this.get(DEFAULT_VERSION); }
}
