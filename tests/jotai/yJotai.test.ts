import { describe, it, expect, vi } from 'vitest'
import * as Y from 'yjs'
import { createStore } from 'jotai/vanilla'
import { createYAtom, createYTextAtom, withTransact } from '@/jotai/yJotai'

describe('createYAtom', () => {
  it('emits initial snapshot, filters events, and writes inside transactions', () => {
    const doc = new Y.Doc()
    const map = doc.getMap<number>('m')

    const countAtom = createYAtom<Y.Map<number>, number, Y.YMapEvent<number>>({
      y: map,
      read: (m) => m.get('count') ?? -1,
      write: (m, next) => {
        m.set('count', next)
      },
      eventFilter: (evt) => evt.keysChanged.has('count'),
    })

    const store = createStore()
    const seen: number[] = []
    const unsubscribe = store.sub(countAtom, () => {
      seen.push(store.get(countAtom))
    })
    expect(store.get(countAtom)).toBe(-1)

    map.set('other', 1)
    expect(seen).toEqual([])

    map.set('count', 5)
    expect(seen).toEqual([5])

    const transactSpy = vi.spyOn(doc, 'transact')
    store.set(countAtom, (prev) => prev + 1)
    expect(transactSpy).toHaveBeenCalledTimes(1)
    expect(map.get('count')).toBe(6)
    expect(seen).toEqual([5, 6])

    store.set(countAtom, 6)
    expect(transactSpy).toHaveBeenCalledTimes(1)

    unsubscribe()
    transactSpy.mockRestore()
  })
})

describe('createYTextAtom', () => {
  it('reads the whole string and writes only the changed span', () => {
    const doc = new Y.Doc()
    const txt = doc.getText('t')
    txt.insert(0, 'hello world')

    const textAtom = createYTextAtom(txt, { origin: 'ui' })
    const store = createStore()
    const unsubscribe = store.sub(textAtom, () => {})

    const deltas: unknown[] = []
    const origins: unknown[] = []
    txt.observe((evt: Y.YTextEvent, tr: Y.Transaction) => {
      deltas.push(evt.delta)
      origins.push(tr.origin)
    })

    store.set(textAtom, 'hello, world')
    expect(txt.toString()).toBe('hello, world')
    expect(deltas).toEqual([[{ retain: 5 }, { insert: ',' }]])
    expect(origins).toEqual(['ui'])

    txt.insert(0, '> ')
    expect(store.get(textAtom)).toBe('> hello, world')

    store.set(textAtom, (prev) => prev.toUpperCase())
    expect(txt.toString()).toBe('> HELLO, WORLD')
    unsubscribe()
  })
})

describe('withTransact', () => {
  it('runs inside a transaction only when a doc is given', () => {
    const doc = new Y.Doc()
    const origins: unknown[] = []
    doc.on('afterTransaction', (tr: Y.Transaction) => origins.push(tr.origin))

    withTransact(doc, () => doc.getText('t').insert(0, 'x'), 'test')
    expect(origins).toEqual(['test'])

    let ran = false
    withTransact(null, () => {
      ran = true
    })
    expect(ran).toBe(true)
  })
})
