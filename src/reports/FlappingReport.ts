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

import { Report } from '../report';
import { SessionRecord } from '../session-record';
import { filterByDailyBursts, groupByUserAndDay, RecordsByDay } from '../filters';

const SHORTEST_SESSIONS = 5;

/**
 * Users whose devices keep dropping and re-establishing sessions, i.e. at
 * least `minDailyCount` sessions on some day.
 */
export class FlappingReport implements Report<SessionRecord[]> {

    private records: SessionRecord[] = [];

    constructor(readonly minDailyCount?: number) {
    }

    name: string = 'session-flapping';

    consume(record: SessionRecord) {
        this.records.push(record);
    }

    getResult(): SessionRecord[] {
        return filterByDailyBursts(this.records, this.minDailyCount);
    }

    render(results: SessionRecord[]): string {
        const devices = firstDevices(results);

        return [...groupByUserAndDay(results)]
            .sort(([a], [b]) => compareCodeUnits(a, b))
            .map(([user, days]) => renderUser(user, devices.get(user) ?? '', days))
            .join('\n\n');
    }
}

// Assumes one device per user; when a user's sessions disagree, the first one seen wins.
function firstDevices(records: SessionRecord[]): Map<string, string> {
    const devices = new Map<string, string>();
    for (const record of records) {
        if (!devices.has(record.userId)) {
            devices.set(record.userId, record.deviceId);
        }
    }
    return devices;
}

function renderUser(user: string, device: string, days: RecordsByDay): string {
    const lines = [`${user} (${device})`];
    const ordered = [...days].sort(([a], [b]) => compareCodeUnits(a, b));
    for (const [, sessions] of ordered) {
        lines.push(renderDay(sessions));
    }
    return lines.join('\n');
}

function renderDay(sessions: SessionRecord[]): string {
    const date = sessions[0].timestamp.toFormat('dd.MM.yyyy');
    const shortest = sessions.map(it => it.duration)
        .sort((a, b) => a - b)
        .slice(0, SHORTEST_SESSIONS)
        .map(duration => `${duration}s`)
        .join(',');
    return `${date}: ${sessions.length} sessions. Shortest: ${shortest}`;
}

function compareCodeUnits(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
