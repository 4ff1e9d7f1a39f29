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
import { availableParallelism } from 'os';
import { XMLParser } from 'fast-xml-parser';
import { DateTime } from 'luxon';
import PQueue from 'p-queue';
import through from 'through2';
import { SessionRecord } from './session-record';
import { DEFAULT_BATCH_SIZE } from './config/RunConfig';

export const TIMESTAMP_FORMAT = 'MM/dd/yyyy HH:mm:ss';

const fieldNames = {
    timestamp: 'Event-Timestamp',
    duration: 'Acct-Session-Time',
    deviceId: 'Calling-Station-Id',
    userId: 'User-Name',
} as const;

const durationPattern = /^\d+$/;

// Every NPS field carries a data_type attribute that we have no use for.
const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: false,
});

type EventDocument = { [field: string]: unknown };

/**
 * Pulls a session out of one accounting event. Most lines in an NPS log are
 * other event types, so anything that doesn't carry all four fields in the
 * expected shape is simply not a session: the result is `undefined`.
 */
export function extractRecord(line: string): SessionRecord | undefined {
    const event = parseEvent(line);
    if (!event) {
        return undefined;
    }

    const timestamp = parseTimestamp(fieldText(event, fieldNames.timestamp));
    const duration = parseDuration(fieldText(event, fieldNames.duration));
    const deviceId = fieldText(event, fieldNames.deviceId);
    const userId = fieldText(event, fieldNames.userId)?.trim().toLowerCase();

    if (!timestamp || duration === undefined || deviceId === undefined || !userId) {
        return undefined;
    }

    return { timestamp, duration, deviceId, userId };
}

function parseEvent(line: string): EventDocument | undefined {
    if (!line.trimStart().startsWith('<')) {
        return undefined;
    }

    let document: unknown;
    try {
        document = parser.parse(line, true);
    } catch {
        return undefined;
    }
    if (!isDocument(document)) {
        return undefined;
    }

    return Object.values(document).find(isDocument);
}

function isDocument(value: unknown): value is EventDocument {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldText(event: EventDocument, name: string): string | undefined {
    const value = event[name];
    return typeof value === 'string' ? value : undefined;
}

function parseTimestamp(value: string | undefined): DateTime | undefined {
    if (value === undefined) {
        return undefined;
    }
    const parsed = DateTime.fromFormat(value, TIMESTAMP_FORMAT, { zone: 'utc' });
    return parsed.isValid ? parsed : undefined;
}

function parseDuration(value: string | undefined): number | undefined {
    if (value === undefined || !durationPattern.test(value)) {
        return undefined;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function extractBatch(lines: string[]): SessionRecord[] {
    const records: SessionRecord[] = [];
    for (const line of lines) {
        const record = extractRecord(line);
        if (record) {
            records.push(record);
        }
    }
    return records;
}

export interface ExtractOptions {
    concurrency?: number
    batchSize?: number
}

export interface ExtractionStats {
    lines: number
    records: number
}

/**
 * Object-mode transform from raw lines to {@link SessionRecord}s. Lines are
 * batched and each batch is extracted as its own task on a bounded queue;
 * the transform stops taking input while `concurrency` batches are waiting.
 */
export function extractRecords(options: ExtractOptions = {}, stats?: ExtractionStats): Transform {
    const concurrency = options.concurrency ?? availableParallelism();
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const queue = new PQueue({ concurrency });
    let pending: string[] = [];

    function submit(stream: Transform, lines: string[]) {
        queue.add(() => extractBatch(lines))
            .then(records => {
                if (stats) {
                    stats.records += records.length;
                }
                records.forEach(record => stream.push(record));
            })
            .catch(err => stream.destroy(err));
    }

    return through.obj(
        function (line: string, enc, cb) {
            if (stats) {
                stats.lines++;
            }
            pending.push(line);
            if (pending.length < batchSize) {
                cb();
                return;
            }

            submit(this, pending);
            pending = [];
            if (queue.size < concurrency) {
                cb();
                return;
            }
            queue.onEmpty().then(() => cb(), err => this.destroy(err));
        },
        function (cb) {
            if (pending.length > 0) {
                submit(this, pending);
                pending = [];
            }
            queue.onIdle().then(() => cb(), err => this.destroy(err));
        },
    );
}
