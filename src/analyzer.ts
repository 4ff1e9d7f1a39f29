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

import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { RunConfig } from './config/RunConfig';
import { readLines } from './line-source';
import { ExtractionStats, extractRecords } from './radius-parser';
import { durationFilter } from './filters';
import { FlappingReport } from './reports/FlappingReport';
import { Report } from './report';
import { SessionRecord } from './session-record';
import { Messager, silentMessager } from './messagers';

function consumeInto(report: Report<unknown>): Writable {
    return new Writable({
        objectMode: true,
        write(record: SessionRecord, enc, cb) {
            report.consume(record);
            cb();
        },
    });
}

/**
 * Scans the log named by `config` and renders the flapping report. Rejects
 * with a `SourceUnavailableError` if the log can't be opened; no partial
 * report is produced.
 */
export async function run(config: RunConfig, messager: Messager = silentMessager): Promise<string> {
    const report = new FlappingReport(config.minDailyCount);
    const stats: ExtractionStats = { lines: 0, records: 0 };

    await pipeline(
        Readable.from(readLines(config.inputPath)),
        extractRecords({ concurrency: config.concurrency, batchSize: config.batchSize }, stats),
        durationFilter(config.maxDuration),
        consumeInto(report),
    );

    const results = report.getResult();
    messager.info(`${report.name}: read ${stats.lines} lines, extracted ${stats.records} sessions, ${results.length} reported`);

    return report.render(results);
}
