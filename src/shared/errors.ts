/**
 * Raised at startup when a feed list, rule file or environment value cannot be used.
 */
export class ConfigError extends Error {
    constructor(message: string, readonly source?: string) {
        super(source ? `${source}: ${message}` : message);
        this.name = 'ConfigError';
    }
}
