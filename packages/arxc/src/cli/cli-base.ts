import { parseArgs, type ParseArgsConfig } from "node:util";

import { exitWithError } from "./output.js";

export interface OptionConfig {
  type: "string" | "boolean";
  multiple?: boolean;
  short?: string;
  default?: string | boolean | string[] | boolean[];
  description?: string;
  /** Placeholder shown in help, as in `--output <file>` */
  placeholder?: string;
}

export interface CliConfig {
  name: string;
  description: string;
  options: Record<string, OptionConfig>;
  allowPositionals?: boolean;
  /** Positional arguments as shown in the usage line */
  usage?: string;
  examples?: string[];
}

type Options = NonNullable<ParseArgsConfig["options"]>;

export abstract class CliBase {
  protected readonly values: Record<string, unknown>;
  protected readonly positionals: string[];

  constructor(
    protected readonly config: CliConfig,
    args: string[] = process.argv.slice(2),
  ) {
    // Strip out custom properties before passing to parseArgs
    const options: Options = {
      help: { type: "boolean", short: "h" },
    };
    for (const [key, option] of Object.entries(config.options)) {
      const { type, multiple, short, default: defaultValue } = option;
      options[key] = {
        type,
        ...(multiple !== undefined ? { multiple } : {}),
        ...(short !== undefined ? { short } : {}),
        ...(defaultValue !== undefined ? { default: defaultValue } : {}),
      };
    }

    const parsed = parseArgs({
      args,
      options,
      allowPositionals: config.allowPositionals ?? false,
    });

    this.values = { ...parsed.values };
    this.positionals = parsed.positionals;
  }

  protected abstract shouldShowHelp(): boolean;
  protected abstract validateArgs(): void;
  protected abstract execute(): Promise<void>;

  protected string(name: string): string | undefined {
    const value = this.values[name];
    return typeof value === "string" ? value : undefined;
  }

  protected strings(name: string): string[] {
    const value = this.values[name];
    if (Array.isArray(value)) {
      return value.filter((item): item is string => typeof item === "string");
    }
    return typeof value === "string" ? [value] : [];
  }

  protected flag(name: string): boolean {
    return this.values[name] === true;
  }

  helpText(): string {
    const lines = [`${this.config.description}`, ""];
    lines.push(
      `Usage: ${this.config.name} [options]${this.config.usage ? ` ${this.config.usage}` : ""}`,
    );

    lines.push("", "Options:");
    lines.push(`  -h, --help${" ".repeat(20)}Show this help message`);
    for (const [name, option] of Object.entries(this.config.options)) {
      const shortFlag = option.short ? `-${option.short}, ` : "    ";
      const flag = option.placeholder
        ? `--${name} <${option.placeholder}>`
        : `--${name}`;
      const defaultValue =
        option.default !== undefined ? ` (default: ${option.default})` : "";
      lines.push(
        `  ${shortFlag}${flag.padEnd(26)}${option.description ?? ""}${defaultValue}`,
      );
    }

    if (this.config.examples && this.config.examples.length > 0) {
      lines.push("", "Examples:");
      for (const example of this.config.examples) {
        lines.push(`  ${example}`);
      }
    }

    return lines.join("\n");
  }

  async run(): Promise<void> {
    if (this.flag("help") || this.shouldShowHelp()) {
      console.log(this.helpText());
      return;
    }

    try {
      this.validateArgs();
      await this.execute();
    } catch (error) {
      exitWithError(error instanceof Error ? error.message : String(error));
    }
  }
}
