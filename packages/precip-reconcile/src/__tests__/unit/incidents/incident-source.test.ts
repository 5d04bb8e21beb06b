/**
 * Incident Row Validation Tests
 *
 * Validates coercion of source rows into incidents and rejection of rows
 * the comparison cannot use.
 */

import { describe, it, expect } from 'vitest';
import { parseIncidentRow, parseIncidentRows } from '../../../incidents/incident-source.js';

const ROW = {
  incident_id: 'CR-1001',
  incident_lat: 30.25,
  incident_lon: -97.75,
  mrms_timestamp: '2024-06-01 12:00:30',
  data_value: 0.5,
};

describe('parseIncidentRow', () => {
  it('should keep the full row on a valid incident', () => {
    expect(parseIncidentRow(ROW)).toEqual({
      id: 'CR-1001',
      lat: 30.25,
      lon: -97.75,
      timestamp: '2024-06-01 12:00:30',
      row: ROW,
    });
  });

  it('should coerce numeric strings and numeric ids', () => {
    const incident = parseIncidentRow({ ...ROW, incident_id: 42, incident_lat: '30.25', incident_lon: ' -97.75 ' });

    expect(incident).toMatchObject({ id: '42', lat: 30.25, lon: -97.75 });
  });

  it('should accept Date timestamps', () => {
    const when = new Date(Date.UTC(2024, 5, 1, 12));
    const incident = parseIncidentRow({ ...ROW, mrms_timestamp: when });

    expect(incident).toMatchObject({ timestamp: when });
  });

  it('should reject a non-numeric coordinate', () => {
    const reason = parseIncidentRow({ ...ROW, incident_lat: 'north' });

    expect(typeof reason).toBe('string');
    expect(String(reason).startsWith('incident_lat:')).toBe(true);
  });

  it('should reject a missing timestamp', () => {
    const reason = parseIncidentRow({ ...ROW, mrms_timestamp: null });

    expect(String(reason).startsWith('mrms_timestamp:')).toBe(true);
  });

  it('should reject an out-of-range latitude', () => {
    expect(parseIncidentRow({ ...ROW, incident_lat: 91 })).toBe('incident_lat: latitude 91 out of range');
  });

  it('should read configured column names', () => {
    const incident = parseIncidentRow(
      { id: 'x', y_coord: 1, x_coord: 2, at: '2024-06-01 00:00', precip: 0 },
      { id: 'id', lat: 'y_coord', lon: 'x_coord', timestamp: 'at', value: 'precip' }
    );

    expect(incident).toMatchObject({ id: 'x', lat: 1, lon: 2 });
  });
});

describe('parseIncidentRows', () => {
  it('should separate usable incidents from rejected rows by index', () => {
    const batch = parseIncidentRows([ROW, { ...ROW, incident_lat: 120 }, { ...ROW, incident_id: 'CR-1002' }]);

    expect(batch.incidents.map((i) => i.id)).toEqual(['CR-1001', 'CR-1002']);
    expect(batch.rejected).toEqual([{ index: 1, reason: 'incident_lat: latitude 120 out of range' }]);
  });
});
