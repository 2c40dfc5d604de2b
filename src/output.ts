/**
 * Output abstraction for testability
 * Allows dependency injection of console, mock, or silent output
 */

export interface Output {
  error(message: string): Promise<void>;
  warning(message: string): Promise<void>;
  info(message: string): Promise<void>;
  success(message: string): Promise<void>;
  debug(message: string): Promise<void>;
}

/**
 * Console output implementation
 */
export class ConsoleOutput implements Output {
  constructor(private readonly prefix = '') {}

  async error(message: string): Promise<void> {
    console.error(`❌ ${this.prefix}${message}`);
  }

  async warning(message: string): Promise<void> {
    console.warn(`⚠️  ${this.prefix}${message}`);
  }

  async info(message: string): Promise<void> {
    console.log(`ℹ️  ${this.prefix}${message}`);
  }

  async success(message: string): Promise<void> {
    console.log(`✅ ${this.prefix}${message}`);
  }

  async debug(message: string): Promise<void> {
    if (process.env.DEBUG) {
      console.debug(`🔍 ${this.prefix}${message}`);
    }
  }
}

/**
 * Silent output, the library default
 */
export class SilentOutput implements Output {
  async error(_message: string): Promise<void> {}
  async warning(_message: string): Promise<void> {}
  async info(_message: string): Promise<void> {}
  async success(_message: string): Promise<void> {}
  async debug(_message: string): Promise<void> {}
}

/**
 * Mock output for testing
 */
export class MockOutput implements Output {
  errors: string[] = [];
  warnings: string[] = [];
  infos: string[] = [];
  successes: string[] = [];
  debugs: string[] = [];

  async error(message: string): Promise<void> {
    this.errors.push(message);
  }

  async warning(message: string): Promise<void> {
    this.warnings.push(message);
  }

  async info(message: string): Promise<void> {
    this.infos.push(message);
  }

  async success(message: string): Promise<void> {
    this.successes.push(message);
  }

  async debug(message: string): Promise<void> {
    this.debugs.push(message);
  }

  /**
   * Clear all recorded output
   */
  clear(): void {
    this.errors = [];
    this.warnings = [];
    this.infos = [];
    this.successes = [];
    this.debugs = [];
  }

  /**
   * Get all recorded messages
   */
  getAll(): string[] {
    return [
      ...this.errors.map(e => `ERROR: ${e}`),
      ...this.warnings.map(w => `WARN: ${w}`),
      ...this.infos.map(i => `INFO: ${i}`),
      ...this.successes.map(s => `SUCCESS: ${s}`),
      ...this.debugs.map(d => `DEBUG: ${d}`),
    ];
  }
}
