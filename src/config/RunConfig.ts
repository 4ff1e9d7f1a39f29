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

import { availableParallelism } from 'os';
import { ConfigValidation } from './Validation';

export const DEFAULT_BATCH_SIZE = 512;

export class RunConfig {
    constructor(
        readonly inputPath: string,
        readonly maxDuration?: number,
        readonly minDailyCount?: number,
        readonly concurrency: number = availableParallelism(),
        readonly batchSize: number = DEFAULT_BATCH_SIZE,
    ) {
    }
}

export function validateRunConfig(config: RunConfig, validation: ConfigValidation) {
    if (!config.inputPath) {
        validation.error(`'inputPath' is missing`);
    }
    if (config.maxDuration !== undefined) {
        if (!Number.isInteger(config.maxDuration) || config.maxDuration < 0) {
            validation.error(`'maxDuration' must be a non-negative integer, got ${config.maxDuration}`);
        }
    }
    if (config.minDailyCount !== undefined) {
        if (!Number.isInteger(config.minDailyCount) || config.minDailyCount < 0) {
            validation.error(`'minDailyCount' must be a non-negative integer, got ${config.minDailyCount}`);
        } else if (config.minDailyCount === 0) {
            validation.warning(`'minDailyCount' is 0, every user will be reported`);
        }
    }
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
        validation.error(`'concurrency' must be a positive integer, got ${config.concurrency}`);
    }
    if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
        validation.error(`'batchSize' must be a positive integer, got ${config.batchSize}`);
    }
}
