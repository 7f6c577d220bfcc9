/**
 * Credentials for the engine login and the DCT API key lookup.
 * @module auth
 */

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Engine login credentials.
 */
export interface EngineCredentials {
  username: string;
  password: SecretString;
}

/**
 * Credential provider for the engine login.
 */
export interface CredentialProvider {
  getCredentials(): Promise<EngineCredentials>;
}

/**
 * Static credential provider using fixed credentials.
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: EngineCredentials;

  constructor(username: string, password: string | SecretString) {
    this.credentials = {
      username,
      password: typeof password === 'string' ? new SecretString(password) : password,
    };
  }

  async getCredentials(): Promise<EngineCredentials> {
    return this.credentials;
  }
}

/**
 * Engine credential provider backed by environment variables.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(
    private readonly usernameVar: string = 'DELPHIX_ENGINE_USERNAME',
    private readonly passwordVar: string = 'DELPHIX_ENGINE_PASSWORD'
  ) {}

  async getCredentials(): Promise<EngineCredentials> {
    const username = process.env[this.usernameVar];
    const password = process.env[this.passwordVar];

    if (!username) {
      throw new Error(`Environment variable ${this.usernameVar} not set`);
    }
    if (!password) {
      throw new Error(`Environment variable ${this.passwordVar} not set`);
    }

    return { username, password: new SecretString(password) };
  }
}

/**
 * Looks up DCT API keys by credential id.
 *
 * Returns `undefined` when no key is stored under the id; the build steps
 * report that on the build log instead of failing.
 */
export interface CredentialStore {
  getApiKey(credentialId: string): Promise<SecretString | undefined>;
}

/**
 * In-memory credential store.
 */
export class StaticCredentialStore implements CredentialStore {
  private readonly keys = new Map<string, SecretString>();

  constructor(keys: Record<string, string> = {}) {
    for (const [id, key] of Object.entries(keys)) {
      this.keys.set(id, new SecretString(key));
    }
  }

  /**
   * Stores or replaces the key for a credential id.
   */
  put(credentialId: string, apiKey: string): this {
    this.keys.set(credentialId, new SecretString(apiKey));
    return this;
  }

  async getApiKey(credentialId: string): Promise<SecretString | undefined> {
    return this.keys.get(credentialId);
  }
}

/**
 * Credential store reading `<prefix><ID>` environment variables, where the
 * id is upper-cased and every non-alphanumeric character becomes `_`.
 *
 * @example
 * // DELPHIX_DCT_API_KEY_PROD_DCT=...
 * await new EnvCredentialStore().getApiKey('prod-dct');
 */
export class EnvCredentialStore implements CredentialStore {
  constructor(private readonly prefix: string = 'DELPHIX_DCT_API_KEY_') {}

  static variableName(prefix: string, credentialId: string): string {
    return `${prefix}${credentialId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
  }

  async getApiKey(credentialId: string): Promise<SecretString | undefined> {
    const value = process.env[EnvCredentialStore.variableName(this.prefix, credentialId)];
    return value ? new SecretString(value) : undefined;
  }
}
