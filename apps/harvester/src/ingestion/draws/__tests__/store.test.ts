import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { PersistenceWriteError } from '../../../config/errors.js'
import { serializeStore } from '../codec.js'
import { reconcile } from '../reconcile.js'
import { JsonFileDrawStore } from '../store.js'
import { ballsFrom, record, storeOf } from './helpers.js'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'drawledger-store-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('JsonFileDrawStore.load', () => {
  it('returns an empty store when the file does not exist', async () => {
    const store = await new JsonFileDrawStore(join(dir, 'missing.json')).load()
    expect(store.size).toBe(0)
  })

  it('returns an empty store when the file is not a JSON list', async () => {
    const path = join(dir, 'draws.json')

    await writeFile(path, '{"period": "1"', 'utf8')
    expect((await new JsonFileDrawStore(path).load()).size).toBe(0)

    await writeFile(path, '{"draws": []}', 'utf8')
    expect((await new JsonFileDrawStore(path).load()).size).toBe(0)
  })

  it('keeps the first of two complete duplicates and sets the rest aside on save', async () => {
    const path = join(dir, 'draws.json')
    const broken = { period: '114000002', date: '', balls: [1, 2, 3], super: null }
    const laterDuplicate = { period: '114000001', date: '2025-08-19', balls: ballsFrom(2), super: 6 }
    await writeFile(
      path,
      JSON.stringify([
        { period: '114000001', date: '2025-08-19', balls: ballsFrom(1), super: 5 },
        broken,
        laterDuplicate,
      ]),
      'utf8'
    )
    const gateway = new JsonFileDrawStore(path)

    const store = await gateway.load()
    expect([...store.values()]).toEqual([record('114000001', 1, 5, '2025-08-19')])

    await gateway.save(store)
    expect(JSON.parse(await readFile(gateway.rejectedPath, 'utf8'))).toEqual([broken, laterDuplicate])
  })

  it('prefers a complete duplicate over an incomplete one regardless of order', async () => {
    const path = join(dir, 'draws.json')
    await writeFile(
      path,
      JSON.stringify([
        { period: 114000001, date: '', balls: ballsFrom(1), super: null },
        { period: 114000001, date: '', balls: ballsFrom(1), super: 5 },
      ]),
      'utf8'
    )
    const gateway = new JsonFileDrawStore(path)

    const loaded = await gateway.load()
    expect(loaded.get('114000001')?.superNumber).toBe(5)

    const { store } = reconcile(loaded, [record('114000002', 2, 6)])
    await gateway.save(store)

    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual([
      { period: '114000001', date: '', balls: ballsFrom(1), super: 5 },
      { period: '114000002', date: '', balls: ballsFrom(2), super: 6 },
    ])
    expect(await readdir(dir)).toEqual(['draws.json'])
  })

  it('keeps an entry with an out-of-range super number as incomplete', async () => {
    const path = join(dir, 'draws.json')
    await writeFile(path, JSON.stringify([{ period: '114000001', balls: ballsFrom(1), super: 81 }]), 'utf8')
    const gateway = new JsonFileDrawStore(path)

    const { store } = reconcile(await gateway.load(), [record('114000002', 2, 6)])
    await gateway.save(store)

    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual([
      { period: '114000001', date: '', balls: ballsFrom(1), super: null },
      { period: '114000002', date: '', balls: ballsFrom(2), super: 6 },
    ])
  })
})

describe('JsonFileDrawStore.save', () => {
  it('writes the serialized store, creating parent directories', async () => {
    const path = join(dir, 'nested', 'draws.json')
    const store = storeOf(record('114000002', 2), record('114000001', 1, 5, '2025-08-19'))

    await new JsonFileDrawStore(path).save(store)

    expect(await readFile(path, 'utf8')).toBe(serializeStore(store))
    expect(await readdir(join(dir, 'nested'))).toEqual(['draws.json'])
    expect(await new JsonFileDrawStore(path).load()).toEqual(store)
  })

  it('appends set-aside entries to an existing rejected file without repeating them', async () => {
    const path = join(dir, 'draws.json')
    const earlier = { period: 'x' }
    const broken = { period: '114000002', balls: [1, 2, 3] }
    await writeFile(`${path}.rejected.json`, JSON.stringify([earlier, broken]), 'utf8')
    await writeFile(path, JSON.stringify([broken, { period: 'y' }]), 'utf8')
    const gateway = new JsonFileDrawStore(path)

    await gateway.save(await gateway.load())

    expect(JSON.parse(await readFile(gateway.rejectedPath, 'utf8'))).toEqual([earlier, broken, { period: 'y' }])
    expect(await readFile(path, 'utf8')).toBe('[]\n')
  })

  it('refuses to rewrite the store when set-aside entries cannot be kept', async () => {
    const path = join(dir, 'draws.json')
    const original = JSON.stringify([{ period: '114000002', balls: [1, 2, 3] }])
    await writeFile(path, original, 'utf8')
    await writeFile(`${path}.rejected.json`, 'not json', 'utf8')
    const gateway = new JsonFileDrawStore(path)

    const save = gateway.save(await gateway.load())

    await expect(save).rejects.toBeInstanceOf(PersistenceWriteError)
    expect(await readFile(path, 'utf8')).toBe(original)
  })

  it('throws PersistenceWriteError when the target cannot be written', async () => {
    const blocker = join(dir, 'not-a-directory')
    await writeFile(blocker, 'x', 'utf8')
    const path = join(blocker, 'draws.json')

    const save = new JsonFileDrawStore(path).save(storeOf(record('1', 1, 5)))

    await expect(save).rejects.toBeInstanceOf(PersistenceWriteError)
    await expect(save).rejects.toMatchObject({
      code: 'PERSISTENCE_WRITE_FAILED',
      message: `Failed to write draw store: ${path}`,
    })
  })
})
