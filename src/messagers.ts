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

export interface Messager {
    info(...message: unknown[]): void
    warning(...message: unknown[]): void
    error(...message: unknown[]): void
}

/**
 * Writes every diagnostic to stderr; stdout is reserved for the report itself.
 */
export class ConsoleMessager implements Messager {

    constructor(readonly quiet: boolean = false) {
    }

    info(...message: unknown[]) {
        if (this.quiet) {
            return;
        }
        console.error(...message);
    }

    warning(...message: unknown[]) {
        console.warn('WARNING:', ...message);
    }

    error(...message: unknown[]) {
        console.error('ERROR:', ...message);
    }
}

export const silentMessager: Messager = {
    info() {},
    warning() {},
    error() {},
};
