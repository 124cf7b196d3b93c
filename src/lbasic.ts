#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { LineBasic } from './line-basic';

interface CLIOptions {
  scriptFile: string | null;
  debug: boolean;
  maxSteps: number | null;
  help: boolean;
}

class LBasicCLI {
  private interpreter: LineBasic;

  constructor() {
    this.interpreter = new LineBasic({ debug: false });
  }

  private async readFromStdin(): Promise<string> {
    let data = '';
    process.stdin.setEncoding('utf8');
    for await (const chunk of process.stdin) {
      data += chunk;
    }
    return data;
  }

  // The name as given, then with `.bas` appended when it has no extension
  private findScriptFile(filename: string): string | null {
    const candidates = path.extname(filename) ? [filename] : [filename, `${filename}.bas`];
    return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
  }

  private parseArgs(args: string[]): CLIOptions | string {
    const options: CLIOptions = { scriptFile: null, debug: false, maxSteps: null, help: false };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '-h' || arg === '--help') {
        options.help = true;
      } else if (arg === '--debug') {
        options.debug = true;
      } else if (arg === '--max-steps') {
        const value = Number(args[i + 1]);
        if (!Number.isInteger(value) || value < 0) {
          return `Invalid value for --max-steps: ${args[i + 1] ?? '(missing)'}`;
        }
        options.maxSteps = value;
        i++;
      } else if (arg.startsWith('-')) {
        return `Unknown option: ${arg}`;
      } else if (options.scriptFile === null) {
        options.scriptFile = arg;
      } else {
        return `Unexpected argument: ${arg}`;
      }
    }

    return options;
  }

  private showUsage(): void {
    console.error(`Usage: lbasic [program.bas] [--max-steps N] [--debug]
       lbasic < program.bas

Run a line-numbered BASIC program and print its output.

Options:
  program.bas     Program file to run (adds .bas extension if needed)
  --max-steps N   Stop the program after N dispatched lines (default 100)
  --debug         Trace every dispatched line

Examples:
  lbasic loop.bas
  lbasic loop --max-steps 500
  echo "print 2+3*4" | lbasic
`);
  }

  async run(args: string[] = process.argv.slice(2)): Promise<number> {
    const parsed = this.parseArgs(args);
    if (typeof parsed === 'string') {
      console.error(`Error: ${parsed}`);
      this.showUsage();
      return 1;
    }

    if (parsed.help) {
      this.showUsage();
      return 0;
    }

    let sourceText: string;

    if (parsed.scriptFile !== null) {
      const scriptFile = this.findScriptFile(parsed.scriptFile);

      if (!scriptFile) {
        console.error(`Error: Program file not found: ${parsed.scriptFile}`);
        if (!path.extname(parsed.scriptFile)) {
          console.error(`Also tried: ${parsed.scriptFile}.bas`);
        }
        return 1;
      }

      try {
        sourceText = fs.readFileSync(scriptFile, 'utf8');
      } catch (error) {
        console.error(`Error reading program file: ${error}`);
        return 1;
      }

      this.interpreter.configure({ filename: scriptFile });

    } else if (!process.stdin.isTTY) {
      try {
        sourceText = await this.readFromStdin();
      } catch (error) {
        console.error(`Error reading from stdin: ${error}`);
        return 1;
      }

    } else {
      this.showUsage();
      return 1;
    }

    this.interpreter.configure({ debug: parsed.debug });
    if (parsed.maxSteps !== null) {
      this.interpreter.configure({ maxSteps: parsed.maxSteps });
    }

    process.stdout.write(this.interpreter.execute(sourceText));

    return this.interpreter.wasHalted() ? 1 : 0;
  }
}

// Run the CLI if this file is executed directly
if (require.main === module) {
  const cli = new LBasicCLI();
  cli.run().then((code) => {
    process.exit(code);
  }).catch((error) => {
    console.error(`Fatal error: ${error}`);
    process.exit(1);
  });
}

export { LBasicCLI };
