/**
 * A settings file could not be parsed or violates the settings schema.
 */
export class SettingsError extends Error {
  constructor(
    public readonly file: string,
    public readonly problems: string[],
  ) {
    super(`Invalid settings in ${file}: ${problems.join('; ')}`);
    this.name = 'SettingsError';
    Object.setPrototypeOf(this, SettingsError.prototype);
  }
}
