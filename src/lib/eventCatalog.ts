import { EVENT_CODES, type EventCode, type EventDescriptor } from '../types';
import { UnknownEventKindError } from './errors';

export const EVENT_CATALOG: Readonly<Record<EventCode, EventDescriptor>> = {
    CME: {
        code: 'CME',
        displayName: 'CME (Coronal Mass Ejection)',
        description: 'Coronal Mass Ejection (CME): A massive burst of solar wind and magnetic fields rising above the solar corona.',
        dateField: 'startTime',
        yLabel: 'Number of CMEs',
        chartKind: 'line',
        chartTitle: 'Trend of CME (Coronal Mass Ejection) Over Time',
        reduction: 'count',
        extraParams: {
            mostAccurateOnly: 'true',
            completeEntryOnly: 'true',
            speed: 500,
            halfAngle: 30,
            catalog: 'ALL'
        }
    },
    GST: {
        code: 'GST',
        displayName: 'GST (Geomagnetic Storm)',
        description: "Geomagnetic Storm (GST): Disturbances in Earth's magnetosphere caused by solar wind shocks.",
        dateField: 'startTime',
        yLabel: 'Average Kp Index',
        chartKind: 'line',
        chartTitle: 'Average Kp Index of GST (Geomagnetic Storm) Over Time',
        reduction: 'mean',
        extraParams: {},
        subReadings: {
            field: 'allKpIndex',
            dateField: 'observedTime',
            valueField: 'kpIndex'
        }
    },
    FLR: {
        code: 'FLR',
        displayName: 'FLR (Solar Flare)',
        description: 'Solar Flare (FLR): A sudden flash of increased brightness on the Sun, usually observed near its surface.',
        dateField: 'beginTime',
        yLabel: 'Number of Solar Flares',
        chartKind: 'bar',
        chartTitle: 'Number of FLR (Solar Flare) Over Time',
        reduction: 'count',
        extraParams: {}
    },
    SEP: {
        code: 'SEP',
        displayName: 'SEP (Solar Energetic Particle)',
        description: 'Solar Energetic Particle (SEP): High-energy particles emitted by the Sun, often associated with solar flares and CMEs.',
        dateField: 'eventTime',
        yLabel: 'Number of Solar Energetic Particles',
        chartKind: 'bar',
        chartTitle: 'Number of SEP (Solar Energetic Particle) Over Time',
        reduction: 'count',
        extraParams: {}
    },
    IPS: {
        code: 'IPS',
        displayName: 'IPS (Interplanetary Shock)',
        description: 'Interplanetary Shock (IPS): Shock waves traveling through space, often caused by CMEs or solar wind variations.',
        dateField: 'eventTime',
        yLabel: 'Number of Interplanetary Shocks',
        chartKind: 'bar',
        chartTitle: 'Number of IPS (Interplanetary Shock) Over Time',
        reduction: 'count',
        extraParams: {}
    },
    RBE: {
        code: 'RBE',
        displayName: 'RBE (Radiation Belt Enhancement)',
        description: "Radiation Belt Enhancement (RBE): An increase in the density of charged particles in Earth's radiation belts.",
        dateField: 'eventTime',
        yLabel: 'Number of Radiation Belt Enhancements',
        chartKind: 'bar',
        chartTitle: 'Number of RBE (Radiation Belt Enhancement) Over Time',
        reduction: 'count',
        extraParams: {}
    },
    MPC: {
        code: 'MPC',
        displayName: 'MPC (Magnetopause Crossing)',
        description: "Magnetopause Crossing (MPC): When solar wind plasma crosses Earth's magnetopause, the boundary of the magnetosphere.",
        dateField: 'eventTime',
        yLabel: 'Number of Magnetopause Crossings',
        chartKind: 'bar',
        chartTitle: 'Number of MPC (Magnetopause Crossing) Over Time',
        reduction: 'count',
        extraParams: {}
    },
    HSS: {
        code: 'HSS',
        displayName: 'HSS (High Speed Stream)',
        description: 'High Speed Stream (HSS): Streams of fast-moving solar wind emanating from coronal holes on the Sun.',
        dateField: 'eventTime',
        yLabel: 'Number of High Speed Streams',
        chartKind: 'bar',
        chartTitle: 'Number of HSS (High Speed Stream) Over Time',
        reduction: 'count',
        extraParams: {}
    },
    notifications: {
        code: 'notifications',
        displayName: 'Notifications',
        description: 'Notifications: General alerts and updates related to various space weather events.',
        dateField: 'messageIssueTime',
        yLabel: 'Number of Notifications',
        chartKind: 'bar',
        chartTitle: 'Number of Notifications Over Time',
        reduction: 'count',
        extraParams: {
            type: 'all'
        }
    }
};

export function isEventCode(value: unknown): value is EventCode {
    return typeof value === 'string' && (EVENT_CODES as readonly string[]).includes(value);
}

/**
 * Looks up the descriptor for an event code. The selectable codes are a closed
 * set, so an unknown code here is a programming error rather than user input.
 */
export function describe(code: string): EventDescriptor {
    if (!isEventCode(code)) {
        throw new UnknownEventKindError(code);
    }
    return EVENT_CATALOG[code];
}

export function listEvents(): EventDescriptor[] {
    return EVENT_CODES.map(code => EVENT_CATALOG[code]);
}
