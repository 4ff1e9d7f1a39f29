export interface EventFields {
    timestamp?: string
    duration?: string | number
    device?: string
    user?: string
}

function field(name: string, dataType: number, value: string | number | undefined): string {
    return value === undefined ? '' : `<${name} data_type="${dataType}">${value}</${name}>`;
}

/**
 * One accounting event the way NPS writes it: a single-line XML document
 * with a handful of fields the analyzer ignores around the four it reads.
 */
export function npsEvent(fields: EventFields): string {
    return '<Event>'
        + '<Timestamp data_type="4">10/13/2021 08:00:00.123</Timestamp>'
        + '<Computer-Name data_type="1">NPS01</Computer-Name>'
        + '<Event-Source data_type="1">IAS</Event-Source>'
        + field('Acct-Session-Time', 0, fields.duration)
        + field('User-Name', 1, fields.user)
        + field('Calling-Station-Id', 1, fields.device)
        + '<Packet-Type data_type="0">4</Packet-Type>'
        + field('Event-Timestamp', 4, fields.timestamp)
        + '</Event>';
}

export function sessionsFor(user: string, device: string, date: string, durations: number[]): string[] {
    return durations.map((duration, i) => npsEvent({
        user,
        device,
        duration,
        timestamp: `${date} ${String(8 + (i % 12)).padStart(2, '0')}:00:00`,
    }));
}
