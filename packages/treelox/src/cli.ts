#!/usr/bin/env node
import { EXIT_OK, EXIT_USAGE, printAst, runFile } from "./cli/commands";
import { startRepl } from "./cli/repl";

const VERSION = "0.1.0";

function printUsage() {
    console.log(`treelox ${VERSION}: a tree-walking interpreter for Lox

USAGE:
    treelox [command] [file.lox]

COMMANDS:
    run <file>  Run a script (same as passing the file directly)
    ast <file>  Print the parsed program
    repl        Start an interactive session (default with no arguments)
    help        Show this help message
    version     Print version

EXIT STATUS:
    0 success, 65 syntax errors, 66 unreadable file, 70 runtime error

EXAMPLES:
    treelox hello.lox
    treelox ast hello.lox`);
}

function requireFile(args: string[]): string {
    const filename = args.find(arg => !arg.startsWith("--"));
    if (!filename) {
        console.error("error: no input file specified\n");
        printUsage();
        process.exit(EXIT_USAGE);
    }
    return filename;
}

async function main() {
    const args = process.argv.slice(2);
    const command: string | undefined = args[0];

    switch (command) {
        case undefined:
        case "repl":
            console.log(`treelox ${VERSION} - press Ctrl+D to exit`);
            await startRepl();
            process.exitCode = EXIT_OK;
            break;
        case "run":
            process.exitCode = runFile(requireFile(args.slice(1)));
            break;
        case "ast":
            process.exitCode = printAst(requireFile(args.slice(1)));
            break;
        case "version":
        case "--version":
        case "-v":
            console.log(`treelox ${VERSION}`);
            break;
        case "help":
        case "--help":
        case "-h":
            printUsage();
            break;
        default:
            if (command.startsWith("-")) {
                console.error(`error: unknown option '${command}'\n`);
                printUsage();
                process.exitCode = EXIT_USAGE;
            } else {
                // Anything else is taken as a script path
                process.exitCode = runFile(command);
            }
            break;
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
