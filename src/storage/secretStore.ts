export interface SecretStore {
  getSecret(key: string): string | undefined;
  requireSecret(key: string): string;
}

/** Reads secrets from the environment, preferring `<prefix><KEY>` over `<KEY>`. */
export class EnvSecretStore implements SecretStore {
  constructor(
    private readonly prefix = "",
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  getSecret(key: string): string | undefined {
    const normalizedKey = this.prefix ? `${this.prefix}${key}` : key;
    const value = this.env[normalizedKey] ?? this.env[key];
    if (typeof value !== "string") {
      return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  requireSecret(key: string): string {
    const value = this.getSecret(key);
    if (value === undefined) {
      throw new Error(`Missing required secret: ${key}`);
    }
    return value;
  }
}
