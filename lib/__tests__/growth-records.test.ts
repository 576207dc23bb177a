import { describe, it, expect, beforeEach } from 'vitest'
import {
  createGrowthRecord,
  GrowthDataError,
  GrowthRecordStore,
  parseGrowthCsv,
  serializeGrowthCsv,
} from '../growth-records'
import { MemoryBlobStore } from './fixtures/memory-blob-store'
import { RECORDS_BLOB, RECORDS_CSV } from './fixtures/growth-fixtures'

// ─── createGrowthRecord ─────────────────────────────────────────────────

describe('createGrowthRecord', () => {
  it('computes age as the whole-day difference', () => {
    expect(createGrowthRecord('2024-01-01', '2024-01-15', 4.2)).toEqual({
      date: '2024-01-15',
      ageDays: 14,
      weightKg: 4.2,
    })
  })

  it('counts across a leap day', () => {
    expect(createGrowthRecord('2024-02-01', '2024-03-01', 5).ageDays).toBe(29)
  })

  it('allows a measurement before the date of birth', () => {
    expect(createGrowthRecord('2024-01-10', '2024-01-07', 3.1).ageDays).toBe(-3)
  })

  it('rejects an invalid date', () => {
    expect(() => createGrowthRecord('2024-02-30', '2024-03-01', 4)).toThrow(
      'Date of birth "2024-02-30" is not a valid date'
    )
  })
})

// ─── CSV format ─────────────────────────────────────────────────────────

describe('growth CSV', () => {
  it('writes the header and one line per record', () => {
    const csv = serializeGrowthCsv([
      { date: '2024-01-15', ageDays: 14, weightKg: 4.2 },
      { date: '2024-02-01', ageDays: 31, weightKg: 4.9 },
    ])
    expect(csv).toBe(RECORDS_CSV)
  })

  it('writes only the header for no records', () => {
    expect(serializeGrowthCsv([])).toBe('Date,Age_Days,Weight_kg\n')
  })

  it('drops a time part from stored dates', () => {
    const records = parseGrowthCsv('Date,Age_Days,Weight_kg\n2024-01-15 00:00:00,14,4.2\n')
    expect(records).toEqual([{ date: '2024-01-15', ageDays: 14, weightKg: 4.2 }])
  })
})

// ─── GrowthRecordStore.load ─────────────────────────────────────────────

describe('GrowthRecordStore.load', () => {
  it('loads persisted records in stored order', async () => {
    const store = new GrowthRecordStore(new MemoryBlobStore({ [RECORDS_BLOB]: RECORDS_CSV }), RECORDS_BLOB)

    expect(await store.load()).toEqual({ status: 'loaded', count: 2 })
    expect(store.records).toEqual([
      { date: '2024-01-15', ageDays: 14, weightKg: 4.2 },
      { date: '2024-02-01', ageDays: 31, weightKg: 4.9 },
    ])
  })

  it('starts empty when nothing is stored', async () => {
    const store = new GrowthRecordStore(new MemoryBlobStore(), RECORDS_BLOB)

    expect(await store.load()).toEqual({ status: 'empty', reason: 'missing' })
    expect(store.size).toBe(0)
  })

  it('starts empty when a column is missing', async () => {
    const blobs = new MemoryBlobStore({ [RECORDS_BLOB]: 'Date,Weight_kg\n2024-01-15,4.2\n' })
    const store = new GrowthRecordStore(blobs, RECORDS_BLOB)

    expect(await store.load()).toEqual({
      status: 'empty',
      reason: 'malformed',
      detail: 'Missing column(s): Age_Days',
    })
    expect(store.size).toBe(0)
  })

  it('starts empty when a stored value does not parse', async () => {
    const blobs = new MemoryBlobStore({ [RECORDS_BLOB]: 'Date,Age_Days,Weight_kg\nyesterday,14,4.2\n' })
    const store = new GrowthRecordStore(blobs, RECORDS_BLOB)

    const outcome = await store.load()
    expect(outcome).toEqual({
      status: 'empty',
      reason: 'malformed',
      detail: 'Row 1 Date "yesterday" is not a valid date',
    })
  })

  it('starts empty when storage cannot be read', async () => {
    const blobs = new MemoryBlobStore({ [RECORDS_BLOB]: RECORDS_CSV })
    blobs.readError = new Error('network down')
    const store = new GrowthRecordStore(blobs, RECORDS_BLOB)

    expect(await store.load()).toEqual({ status: 'empty', reason: 'unreadable', detail: 'network down' })
    expect(store.size).toBe(0)
  })

  it('skips rows holding only delimiters or whitespace', async () => {
    const blobs = new MemoryBlobStore({ [RECORDS_BLOB]: RECORDS_CSV + ',,\n \n' })
    const store = new GrowthRecordStore(blobs, RECORDS_BLOB)

    expect(await store.load()).toEqual({ status: 'loaded', count: 2 })

    await store.addRecord('2024-01-01', '2024-03-01', 5.5)
    expect(blobs.blobs.get(RECORDS_BLOB)).toBe(RECORDS_CSV + '2024-03-01,60,5.5\n')
  })

  it('skips rows whose growth columns are all blank', () => {
    const text = 'Date,Age_Days,Weight_kg,Note\n2024-01-15,14,4.2,\n,, ,checkup\n'
    expect(parseGrowthCsv(text)).toEqual([{ date: '2024-01-15', ageDays: 14, weightKg: 4.2 }])
  })
})

// ─── GrowthRecordStore mutations ────────────────────────────────────────

describe('GrowthRecordStore mutations', () => {
  let blobs: MemoryBlobStore
  let store: GrowthRecordStore

  beforeEach(async () => {
    blobs = new MemoryBlobStore({ [RECORDS_BLOB]: RECORDS_CSV })
    store = new GrowthRecordStore(blobs, RECORDS_BLOB)
    await store.load()
  })

  it('appends a record and persists the whole store', async () => {
    const record = await store.addRecord('2024-01-01', '2024-02-15', 5.3)

    expect(record).toEqual({ date: '2024-02-15', ageDays: 45, weightKg: 5.3 })
    expect(store.size).toBe(3)
    expect(blobs.blobs.get(RECORDS_BLOB)).toBe(RECORDS_CSV + '2024-02-15,45,5.3\n')
  })

  it('keeps insertion order instead of sorting by date', async () => {
    await store.addRecord('2024-01-01', '2024-01-08', 3.6)

    expect(store.records.map((r) => r.date)).toEqual(['2024-01-15', '2024-02-01', '2024-01-08'])
  })

  it('does not write or change anything for an invalid date', async () => {
    await expect(store.addRecord('2024-01-01', 'soon', 4)).rejects.toThrow(GrowthDataError)

    expect(blobs.writes).toHaveLength(0)
    expect(store.size).toBe(2)
  })

  it('keeps the last persisted records when a write fails', async () => {
    blobs.writeError = new Error('storage unavailable')

    await expect(store.addRecord('2024-01-01', '2024-02-15', 5.3)).rejects.toThrow('storage unavailable')
    expect(store.size).toBe(2)
  })

  it('replaces all records, coercing table values', async () => {
    await store.replaceAll([{ Date: '2024-01-20T00:00:00', Age_Days: '19', Weight_kg: '4.25' }])

    expect(store.records).toEqual([{ date: '2024-01-20', ageDays: 19, weightKg: 4.25 }])
    expect(blobs.blobs.get(RECORDS_BLOB)).toBe('Date,Age_Days,Weight_kg\n2024-01-20,19,4.25\n')
  })

  it('does not recompute age when a date is edited', async () => {
    await store.replaceAll([
      { Date: '2024-01-22', Age_Days: 14, Weight_kg: 4.2 },
      { Date: '2024-02-01', Age_Days: 31, Weight_kg: 4.9 },
    ])

    expect(store.records[0]).toEqual({ date: '2024-01-22', ageDays: 14, weightKg: 4.2 })
  })

  it('rejects a value that cannot be coerced', async () => {
    await expect(
      store.replaceAll([{ Date: '2024-01-15', Age_Days: 14, Weight_kg: 'heavy' }])
    ).rejects.toThrow('Row 1 Weight_kg "heavy" is not a number')

    expect(store.size).toBe(2)
    expect(blobs.writes).toHaveLength(0)
  })

  it('leaves the data unchanged when replaced with its own rows', async () => {
    await store.replaceAll(store.toRows())

    expect(blobs.blobs.get(RECORDS_BLOB)).toBe(RECORDS_CSV)
    expect(store.toRows()).toEqual([
      { Date: '2024-01-15', Age_Days: 14, Weight_kg: 4.2 },
      { Date: '2024-02-01', Age_Days: 31, Weight_kg: 4.9 },
    ])
  })

  it('round-trips replaced rows through storage', async () => {
    const rows = [
      { Date: '2023-12-31', Age_Days: 0, Weight_kg: 3.05 },
      { Date: '2024-03-10', Age_Days: 70, Weight_kg: 5.875 },
    ]
    await store.replaceAll(rows)

    const reopened = new GrowthRecordStore(blobs, RECORDS_BLOB)
    expect(await reopened.load()).toEqual({ status: 'loaded', count: 2 })
    expect(reopened.toRows()).toEqual(rows)
  })
})
