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

import { DateTime } from 'luxon';

/**
 * One authentication session, as extracted from a single accounting event.
 *
 * `userId` is the grouping key: always trimmed, lower-cased and non-empty.
 */
export interface SessionRecord {
    readonly timestamp: DateTime
    readonly duration: number
    readonly deviceId: string
    readonly userId: string
}

const DAY_KEY_FORMAT = 'yyyy-MM-dd';

export function dayOf(record: SessionRecord): string {
    return record.timestamp.toFormat(DAY_KEY_FORMAT);
}
