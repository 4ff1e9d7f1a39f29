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

export enum ExitCode {
    SUCCESS = 0,
    GENERAL_ERROR = 1,
    INVALID_INPUT = 2,
    FILE_ERROR = 3,
}

/**
 * The log file could not be opened for shared reading. Fatal for the whole run.
 */
export class SourceUnavailableError extends Error {
    readonly exitCode = ExitCode.FILE_ERROR;

    constructor(readonly path: string, cause?: unknown) {
        super(`Unable to open log file for reading: ${path}`, { cause });
        this.name = 'SourceUnavailableError';
    }
}
