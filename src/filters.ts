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

import { Transform } from 'stream';
import through from 'through2';
import { dayOf, SessionRecord } from './session-record';

export type RecordsByDay = Map<string, SessionRecord[]>;
export type RecordsByUserAndDay = Map<string, RecordsByDay>;

export function withinDuration(maxDuration?: number): (record: SessionRecord) => boolean {
    if (maxDuration === undefined) {
        return () => true;
    }
    return record => record.duration <= maxDuration;
}

export function filterByDuration(records: Iterable<SessionRecord>, maxDuration?: number): SessionRecord[] {
    return [...records].filter(withinDuration(maxDuration));
}

/**
 * Streaming form of {@link filterByDuration}, so records above the threshold
 * never reach the grouping stage.
 */
export function durationFilter(maxDuration?: number): Transform {
    const accept = withinDuration(maxDuration);
    return through.obj(function (record: SessionRecord, enc, cb) {
        if (accept(record)) {
            cb(null, record);
        } else {
            cb();
        }
    });
}

export function groupByUserAndDay(records: Iterable<SessionRecord>): RecordsByUserAndDay {
    const users: RecordsByUserAndDay = new Map();
    for (const record of records) {
        let days = users.get(record.userId);
        if (!days) {
            days = new Map();
            users.set(record.userId, days);
        }
        const day = dayOf(record);
        const bucket = days.get(day);
        if (bucket) {
            bucket.push(record);
        } else {
            days.set(day, [record]);
        }
    }
    return users;
}

/**
 * Keeps every record of a user who has at least one day with `minDailyCount`
 * or more sessions; drops all other users entirely.
 */
export function filterByDailyBursts(records: Iterable<SessionRecord>, minDailyCount?: number): SessionRecord[] {
    if (minDailyCount === undefined) {
        return [...records];
    }

    const retained: SessionRecord[] = [];
    for (const days of groupByUserAndDay(records).values()) {
        const bursts = [...days.values()].some(bucket => bucket.length >= minDailyCount);
        if (bursts) {
            for (const bucket of days.values()) {
                bucket.forEach(record => retained.push(record));
            }
        }
    }
    return retained;
}
