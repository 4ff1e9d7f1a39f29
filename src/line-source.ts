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

import { createReadStream, ReadStream } from 'fs';
import { stat } from 'fs-extra';
import split from 'split2';
import { SourceUnavailableError } from './errors';

/**
 * Opens `path` for shared reading. Plain `r` takes no lock, so whatever is
 * still writing to the log can keep appending while we read. Anything other
 * than a regular file (a directory opens fine on Linux) is rejected up front.
 */
export function openLogFile(path: string): Promise<ReadStream> {
    return new Promise((resolve, reject) => {
        const stream = createReadStream(path, { flags: 'r' });
        const onError = (err: Error) => {
            stream.destroy();
            reject(new SourceUnavailableError(path, err));
        };
        stream.once('error', onError);
        stream.once('ready', () => {
            stat(path).then(stats => {
                if (!stats.isFile()) {
                    onError(new Error(`Not a regular file: ${path}`));
                    return;
                }
                stream.off('error', onError);
                resolve(stream);
            }, onError);
        });
    });
}

/**
 * Lazily yields the lines of a log file in file order. The file handle is
 * released however iteration ends, including an early `break`.
 */
export async function* readLines(path: string): AsyncGenerator<string, void, undefined> {
    yield* linesOf(await openLogFile(path));
}

export async function* linesOf(file: ReadStream): AsyncGenerator<string, void, undefined> {
    const lines = file.pipe(split());
    file.once('error', err => lines.destroy(err));

    try {
        for await (const line of lines) {
            yield String(line);
        }
    } finally {
        lines.destroy();
        file.destroy();
    }
}
