import { Readable } from 'stream';
import { describe, expect, it } from 'vitest';
import { extractBatch, extractRecord, extractRecords, ExtractionStats } from '../radius-parser';
import { SessionRecord } from '../session-record';
import { npsEvent } from './helpers/events';

const valid = {
    timestamp: '10/13/2021 08:15:30',
    duration: 42,
    device: 'AA-BB-CC-DD-EE-FF',
    user: 'a@x.com',
};

async function collect(lines: string[], stats?: ExtractionStats, concurrency = 2): Promise<SessionRecord[]> {
    const records: SessionRecord[] = [];
    const stream = Readable.from(lines).pipe(extractRecords({ concurrency, batchSize: 3 }, stats));
    for await (const record of stream) {
        records.push(record);
    }
    return records;
}

describe('extractRecord', () => {
    it('extracts the four session fields', () => {
        const record = extractRecord(npsEvent(valid));

        expect(record).toBeDefined();
        expect(record?.timestamp.toFormat('yyyy-MM-dd HH:mm:ss')).toBe('2021-10-13 08:15:30');
        expect(record?.duration).toBe(42);
        expect(record?.deviceId).toBe('AA-BB-CC-DD-EE-FF');
        expect(record?.userId).toBe('a@x.com');
    });

    it('lower-cases and trims the user name', () => {
        const record = extractRecord(npsEvent({ ...valid, user: '  CORP\\Alice@X.COM ' }));

        expect(record?.userId).toBe('corp\\alice@x.com');
    });

    it('keeps the device id exactly as logged', () => {
        expect(extractRecord(npsEvent({ ...valid, device: '  AA-BB  ' }))?.deviceId).toBe('  AA-BB  ');
    });

    it('accepts a zero-length session', () => {
        expect(extractRecord(npsEvent({ ...valid, duration: 0 }))?.duration).toBe(0);
    });

    it.each([
        ['timestamp', { ...valid, timestamp: undefined }],
        ['duration', { ...valid, duration: undefined }],
        ['device', { ...valid, device: undefined }],
        ['user', { ...valid, user: undefined }],
    ])('drops an event without a %s', (_name, fields) => {
        expect(extractRecord(npsEvent(fields))).toBeUndefined();
    });

    it.each([
        ['negative', '-5'],
        ['fractional', '4.5'],
        ['suffixed', '12s'],
        ['spelled out', 'ten'],
        ['empty', ''],
        ['space-padded', ' 42 '],
        ['tab-led', '\t42'],
    ])('drops a %s duration', (_name, duration) => {
        expect(extractRecord(npsEvent({ ...valid, duration }))).toBeUndefined();
    });

    it.each([
        ['ISO', '2021-10-13T08:15:30'],
        ['day first', '13/10/2021 08:15:30'],
        ['date only', '10/13/2021'],
        ['with milliseconds', '10/13/2021 08:15:30.123'],
        ['padded', '  10/13/2021 08:15:30\t'],
    ])('drops a %s timestamp', (_name, timestamp) => {
        expect(extractRecord(npsEvent({ ...valid, timestamp }))).toBeUndefined();
    });

    it('drops an empty user name', () => {
        expect(extractRecord(npsEvent({ ...valid, user: '   ' }))).toBeUndefined();
    });

    it('drops an event that repeats a field', () => {
        const line = npsEvent(valid).replace('</Event>', '<User-Name data_type="1">b@x.com</User-Name></Event>');

        expect(extractRecord(line)).toBeUndefined();
    });

    it.each([
        ['plain text', 'NPS service started'],
        ['an empty line', ''],
        ['an unclosed element', '<Event><User-Name>a@x.com</User-Name>'],
        ['mismatched tags', '<Event><User-Name>a@x.com</Calling-Station-Id></Event>'],
        ['a truncated line', npsEvent(valid).slice(0, 80)],
    ])('drops %s without throwing', (_name, line) => {
        expect(() => extractRecord(line)).not.toThrow();
        expect(extractRecord(line)).toBeUndefined();
    });
});

describe('extractBatch', () => {
    it('keeps only the lines that are sessions', () => {
        const records = extractBatch([
            npsEvent(valid),
            'garbage',
            npsEvent({ ...valid, user: 'b@x.com' }),
        ]);

        expect(records.map(it => it.userId)).toEqual(['a@x.com', 'b@x.com']);
    });
});

describe('extractRecords', () => {
    it('emits a record for every valid line across batches', async () => {
        const lines = Array.from({ length: 10 }, (_, i) => npsEvent({ ...valid, duration: i }));

        const records = await collect(lines);

        expect(records.map(it => it.duration).sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('counts lines read and records extracted', async () => {
        const stats: ExtractionStats = { lines: 0, records: 0 };
        const lines = [npsEvent(valid), 'noise', npsEvent(valid), '<Event/>', npsEvent(valid)];

        await collect(lines, stats);

        expect(stats).toEqual({ lines: 5, records: 3 });
    });

    it('works with a single extraction task', async () => {
        const lines = Array.from({ length: 7 }, () => npsEvent(valid));

        expect(await collect(lines, undefined, 1)).toHaveLength(7);
    });

    it('ends cleanly on empty input', async () => {
        expect(await collect([])).toEqual([]);
    });
});
