/**
 * Credentials
 *
 * Specs say which credentials a tool needs; stores say whether a secret is
 * available. The engine checks availability before calling a tool and never
 * reads secret values itself.
 */

import { MissingCredentialError } from '../errors/RunErrors.js';

/**
 * Declares a credential and the tools that need it
 */
export interface CredentialSpec {
  /** Credential id, e.g. "calendar" */
  readonly name: string;
  /** Environment variable holding the secret */
  readonly envVar?: string;
  /** Tool ids that use the credential */
  readonly tools: readonly string[];
  /** When false the tools can run without it */
  readonly required: boolean;
  readonly description?: string;
  readonly helpUrl?: string;
}

export interface CredentialStore {
  readonly name: string;

  isAvailable(credential: string): Promise<boolean>;

  /**
   * @throws MissingCredentialError when the credential is not available
   */
  get(credential: string): Promise<string>;
}

/**
 * Required credentials for a set of tool refs, in spec order, without duplicates
 */
export function requiredCredentials(
  toolRefs: readonly string[],
  specs: readonly CredentialSpec[]
): CredentialSpec[] {
  const refs = new Set(toolRefs);
  const seen = new Set<string>();
  const result: CredentialSpec[] = [];

  for (const spec of specs) {
    if (!spec.required || seen.has(spec.name)) continue;
    if (spec.tools.some(tool => refs.has(tool))) {
      seen.add(spec.name);
      result.push(spec);
    }
  }
  return result;
}

/**
 * In-memory store (tests and embedding applications)
 */
export class MemoryCredentialStore implements CredentialStore {
  public readonly name = 'memory';
  private readonly secrets = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.secrets.set(key, value);
    }
  }

  set(credential: string, value: string): void {
    this.secrets.set(credential, value);
  }

  delete(credential: string): boolean {
    return this.secrets.delete(credential);
  }

  list(): string[] {
    return [...this.secrets.keys()];
  }

  async isAvailable(credential: string): Promise<boolean> {
    return (this.secrets.get(credential) ?? '') !== '';
  }

  async get(credential: string): Promise<string> {
    const value = this.secrets.get(credential);
    if (value === undefined || value === '') {
      throw new MissingCredentialError(credential);
    }
    return value;
  }
}

/**
 * Environment-variable store. A credential resolves to its spec's `envVar`,
 * or to `<prefix><NAME>` when no spec names one.
 */
export class EnvCredentialStore implements CredentialStore {
  public readonly name = 'env';
  private readonly envVars = new Map<string, string>();

  constructor(
    specs: readonly CredentialSpec[] = [],
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly prefix: string = ''
  ) {
    for (const spec of specs) {
      if (spec.envVar) {
        this.envVars.set(spec.name, spec.envVar);
      }
    }
  }

  variableFor(credential: string): string {
    return this.envVars.get(credential)
      ?? `${this.prefix}${credential.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
  }

  async isAvailable(credential: string): Promise<boolean> {
    return (this.env[this.variableFor(credential)] ?? '') !== '';
  }

  async get(credential: string): Promise<string> {
    const envVar = this.variableFor(credential);
    const value = this.env[envVar];
    if (value === undefined || value === '') {
      throw new MissingCredentialError(credential, { envVar });
    }
    return value;
  }
}

/**
 * First store that has the credential wins
 */
export class ChainedCredentialStore implements CredentialStore {
  public readonly name: string;

  constructor(private readonly stores: readonly CredentialStore[]) {
    this.name = `chain(${stores.map(store => store.name).join(',')})`;
  }

  async isAvailable(credential: string): Promise<boolean> {
    for (const store of this.stores) {
      if (await store.isAvailable(credential)) {
        return true;
      }
    }
    return false;
  }

  async get(credential: string): Promise<string> {
    for (const store of this.stores) {
      if (await store.isAvailable(credential)) {
        return store.get(credential);
      }
    }
    throw new MissingCredentialError(credential);
  }
}
