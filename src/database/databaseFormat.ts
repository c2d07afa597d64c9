import type { CompdbConfig } from '../dx/config.js';

/**
 * Shape of the JSON written by `Database.save`.
 *
 * Loading ignores it: every record's shape is detected on its own.
 * New axes (e.g. whether to write `output`, relative paths) attach here as
 * further fluent setters.
 */
export class DatabaseFormat {
  private commandAsArray = true;

  static fromConfig(config: CompdbConfig | null): DatabaseFormat {
    const format = new DatabaseFormat();
    const commandAsArray = config?.format?.commandAsArray;
    if (commandAsArray !== undefined) format.setCommandAsArray(commandAsArray);
    return format;
  }

  /** `true` writes `arguments` lists, `false` writes one shell-quoted `command` string. */
  setCommandAsArray(value: boolean): this {
    this.commandAsArray = value;
    return this;
  }

  isCommandAsArray(): boolean {
    return this.commandAsArray;
  }
}
