/*
 *  @license
 *    Copyright 2018 Brigham Young University
 *
 *    Licensed under the Apache License, Version 2.0 (the "License");
 *    you may not use this file except in compliance with the License.
 *    You may obtain a copy of the License at
 *
 *        http://www.apache.org/licenses/LICENSE-2.0
 *
 *    Unless required by applicable law or agreed to in writing, software
 *    distributed under the License is distributed on an "AS IS" BASIS,
 *    WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 *    See the License for the specific language governing permissions and
 *    limitations under the License.
 */

import { Command, InvalidArgumentError } from 'commander';
import { outputFile } from 'fs-extra';
import { run } from './analyzer';
import { RunConfig, validateRunConfig } from './config/RunConfig';
import { ConfigValidation } from './config/Validation';
import { ExitCode, SourceUnavailableError } from './errors';
import { ConsoleMessager, Messager } from './messagers';

export interface CliOptions {
    file: string
    sessionTime?: number
    sessionCount?: number
    out?: string
    concurrency?: number
    quiet?: boolean
}

export interface CliIO {
    write(text: string): void
    messager(quiet: boolean): Messager
    setExitCode(code: ExitCode): void
}

const processIO: CliIO = {
    write: text => process.stdout.write(text),
    messager: quiet => new ConsoleMessager(quiet),
    setExitCode: code => {
        process.exitCode = code;
    },
};

function parseInteger(value: string): number {
    if (!/^-?\d+$/.test(value)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return Number.parseInt(value, 10);
}

export function createProgram(io: CliIO = processIO): Command {
    return new Command()
        .name('flap-analyzer')
        .description('Find users whose devices open suspiciously many short RADIUS sessions a day')
        .requiredOption('-f, --file <path>', 'NPS / RADIUS accounting log to scan')
        .option('-t, --sessionTime <seconds>', 'only count sessions lasting at most this long', parseInteger)
        .option('-c, --sessionCount <count>', 'only report users with at least this many sessions on some day', parseInteger)
        .option('-o, --out <path>', 'write the report to a file instead of stdout')
        .option('-j, --concurrency <n>', 'maximum number of line batches queued for extraction', parseInteger)
        .option('-q, --quiet', 'suppress progress output')
        .action(async (options: CliOptions) => {
            const messager = io.messager(options.quiet ?? false);
            const config = new RunConfig(
                options.file,
                options.sessionTime,
                options.sessionCount,
                options.concurrency,
            );

            const validation = new ConfigValidation();
            validateRunConfig(config, validation);
            validation.warnings.forEach(it => messager.warning(it));
            if (!validation.valid) {
                validation.errors.forEach(it => messager.error(it));
                io.setExitCode(ExitCode.INVALID_INPUT);
                return;
            }

            try {
                const report = await run(config, messager);
                if (options.out) {
                    await outputFile(options.out, report ? report + '\n' : report);
                    messager.info('Wrote report to', options.out);
                } else if (report) {
                    io.write(report + '\n');
                } else {
                    messager.info('No users matched');
                }
            } catch (e) {
                if (e instanceof SourceUnavailableError) {
                    messager.error(e.message);
                    io.setExitCode(e.exitCode);
                    return;
                }
                messager.error('Analysis failed:', e);
                io.setExitCode(ExitCode.GENERAL_ERROR);
            }
        });
}

export async function main(argv: string[] = process.argv): Promise<void> {
    await createProgram().parseAsync(argv);
}
