#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from '@/cli';

const program = createProgram({
    env: process.env,
    io: {
        write: (text) => process.stdout.write(text),
        setExitCode: (code) => {
            process.exitCode = code;
        },
    },
});

program.parseAsync(process.argv).catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
