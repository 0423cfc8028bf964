import type { PlatformCode } from "../domain/models";

export interface CredentialLookup {
  get(platform: string): Promise<string | null>;
}

export interface CredentialSources {
  /** Token given at construction; wins over everything else. */
  direct?: string;
  store?: CredentialLookup;
  /** Static value from configuration. Empty means an unauthenticated request. */
  fallback: string;
}

/** Resolved again for every request so a token saved mid-run applies to the next one. */
export class CredentialResolver {
  constructor(
    readonly platform: PlatformCode,
    private readonly sources: CredentialSources
  ) {}

  async resolve(): Promise<string> {
    if (this.sources.direct) return this.sources.direct;
    const stored = this.sources.store ? await this.sources.store.get(this.platform) : null;
    if (stored) return stored;
    return this.sources.fallback;
  }
}
