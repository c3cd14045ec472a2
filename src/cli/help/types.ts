// src/cli/help/types.ts

export interface FlagHelp {
  name: string;
  description: string;
  defaultValue: string;   // display text, empty when there is no default
  required: boolean;
}

export interface CommandHelp {
  id: string;
  description: string;
  flags: FlagHelp[];
}

export interface HelpFormatOptions {
  color?: boolean;        // ANSI colours (off unless asked for)
  width?: number;         // description wrap width, default 80
}
