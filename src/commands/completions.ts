import { Argument, type Command } from 'commander';
import { APP_NAME } from '../config/branding.js';
import { exitWithError } from './shared.js';

export const SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;
export type Shell = (typeof SHELLS)[number];

interface CommandSpec {
  name: string;
  description: string;
  flags: { long: string; short?: string; description: string }[];
}

function collect(program: Command): CommandSpec[] {
  return program.commands.map((cmd) => ({
    name: cmd.name(),
    description: cmd.description(),
    flags: cmd.options.flatMap((opt) =>
      opt.long ? [{ long: opt.long, short: opt.short, description: opt.description }] : [],
    ),
  }));
}

const fn = `_${APP_NAME.replace(/-/g, '_')}`;

function bash(specs: CommandSpec[]): string {
  const lines = [
    `${fn}() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  if [ "$COMP_CWORD" -eq 1 ]; then',
    `    COMPREPLY=( $(compgen -W "${specs.map((s) => s.name).join(' ')}" -- "$cur") )`,
    '    return',
    '  fi',
    '  case "${COMP_WORDS[1]}" in',
  ];
  for (const spec of specs) {
    const words = spec.flags.flatMap((f) => (f.short ? [f.short, f.long] : [f.long])).join(' ');
    lines.push(`    ${spec.name}) COMPREPLY=( $(compgen -W "${words}" -- "$cur") ) ;;`);
  }
  lines.push('  esac', '}', `complete -F ${fn} ${APP_NAME}`);
  return lines.join('\n');
}

function zsh(specs: CommandSpec[]): string {
  const esc = (s: string) => s.replace(/'/g, `'\\''`).replace(/:/g, '\\:');
  const lines = [
    `#compdef ${APP_NAME}`,
    '',
    `${fn}() {`,
    '  local -a commands',
    '  commands=(',
    ...specs.map((s) => `    '${s.name}:${esc(s.description)}'`),
    '  )',
    '  if (( CURRENT == 2 )); then',
    "    _describe 'command' commands",
    '    return',
    '  fi',
    '  case "$words[2]" in',
  ];
  for (const spec of specs) {
    const words = spec.flags.flatMap((f) => (f.short ? [f.short, f.long] : [f.long])).join(' ');
    lines.push(`    ${spec.name}) compadd -- ${words} ;;`);
  }
  lines.push('  esac', '}', '', `compdef ${fn} ${APP_NAME}`);
  return lines.join('\n');
}

function fish(specs: CommandSpec[]): string {
  const esc = (s: string) => s.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  const lines = [`complete -c ${APP_NAME} -f`];
  for (const spec of specs) {
    lines.push(`complete -c ${APP_NAME} -n '__fish_use_subcommand' -a ${spec.name} -d '${esc(spec.description)}'`);
  }
  for (const spec of specs) {
    for (const flag of spec.flags) {
      const short = flag.short ? ` -s ${flag.short.replace(/^-/, '')}` : '';
      lines.push(
        `complete -c ${APP_NAME} -n '__fish_seen_subcommand_from ${spec.name}' -l ${flag.long.replace(/^--/, '')}${short} -d '${esc(flag.description)}'`,
      );
    }
  }
  return lines.join('\n');
}

function powershell(specs: CommandSpec[]): string {
  const lines = [
    `Register-ArgumentCompleter -Native -CommandName '${APP_NAME}' -ScriptBlock {`,
    '    param($wordToComplete, $commandAst, $cursorPosition)',
    '    $words = @($commandAst.CommandElements | ForEach-Object { $_.ToString() })',
    '    $candidates = switch ($words[1]) {',
  ];
  for (const spec of specs) {
    const flags = spec.flags.map((f) => `'${f.long}'`).join(', ');
    lines.push(`        '${spec.name}' { @(${flags}) }`);
  }
  lines.push(
    `        default { @(${specs.map((s) => `'${s.name}'`).join(', ')}) }`,
    '    }',
    '    $candidates | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {',
    "        [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)",
    '    }',
    '}',
  );
  return lines.join('\n');
}

/** Completion script for `shell` covering every command registered on `program`. */
export function renderCompletions(program: Command, shell: Shell): string {
  const specs = collect(program);
  switch (shell) {
    case 'bash':
      return bash(specs);
    case 'zsh':
      return zsh(specs);
    case 'fish':
      return fish(specs);
    case 'powershell':
      return powershell(specs);
  }
}

export function registerCompletions(program: Command): void {
  program
    .command('completions')
    .description('Generate a shell completion script')
    .addArgument(new Argument('<shell>', 'Shell to generate the script for').choices(SHELLS))
    .action((shell: Shell) => {
      try {
        console.log(renderCompletions(program, shell));
      } catch (err) {
        exitWithError(err);
      }
    });
}
