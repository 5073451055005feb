// shellwords ships no type declarations and there is no @types package for it.
declare module "shellwords" {
  export function split(line: string): string[];
  export function escape(word: string): string;
}
