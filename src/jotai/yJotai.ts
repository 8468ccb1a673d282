import { atom, type WritableAtom } from 'jotai/vanilla'
import type * as Y from 'yjs'
import { isEqual } from 'es-toolkit/compat'
import { diffText } from '@/views/humanView'

/**
 * Thin, typed bridge between Yjs types and Jotai atoms.
 *
 * - Subscribe on mount, snapshot on read, write through native Yjs ops.
 * - No double updates: writers never set the atom; Y events propagate.
 */

/** Equality function used to suppress redundant updates. */
export type Equals<T> = (a: T, b: T) => boolean
const defaultEquals = <T>(a: T, b: T): boolean => isEqual(a, b)

type Updater<T> = T | ((prev: T) => T)

const isUpdaterFn = <T>(u: Updater<T>): u is (prev: T) => T => typeof u === 'function'

/** Subscribe to a Y type, optionally to every nested change. */
function subscribeY<Evt>(
  y: Y.AbstractType<Evt>,
  onChange: (evt: Evt | undefined) => void,
  options?: { deep?: boolean }
): () => void {
  if (options?.deep === true) {
    const handler = () => onChange(undefined)
    y.observeDeep(handler)
    return () => y.unobserveDeep(handler)
  }
  const handler = (evt: Evt) => onChange(evt)
  y.observe(handler)
  return () => y.unobserve(handler)
}

/** Run a function inside a Y.Doc transaction when available. */
export function withTransact(doc: Y.Doc | null, fn: () => void, origin?: unknown): void {
  if (doc) doc.transact(fn, origin)
  else fn()
}

export interface CreateYAtomOptions<YType extends Y.AbstractType<Evt>, T, Evt> {
  y: YType
  /** Project the Y value into a typed snapshot. */
  read: (y: YType) => T
  /** Apply the next snapshot with native Yjs operations (runs inside a transaction). */
  write?: (y: YType, next: T) => void
  equals?: Equals<T>
  /** Observe nested changes too. Default: false. */
  deep?: boolean
  /** Skip events that cannot change the snapshot. Not applied to deep observation. */
  eventFilter?: (evt: Evt) => boolean
  /** Transaction origin for writes. */
  origin?: unknown
}

/**
 * Create a typed Jotai atom bound to a specific Y type.
 * Subscribes on mount, unsubscribes on unmount; `equals` suppresses updates.
 */
export function createYAtom<YType extends Y.AbstractType<Evt>, T, Evt = unknown>(
  opts: CreateYAtomOptions<YType, T, Evt>
): WritableAtom<T, [Updater<T>], void> {
  const { y, read, write, equals = defaultEquals, deep, eventFilter, origin } = opts

  // synchronous initial read keeps store.get() stable before mount
  const base = atom<T>(read(y))

  base.onMount = (set) => {
    let prev = read(y)
    set(prev)

    return subscribeY<Evt>(
      y,
      (evt) => {
        if (evt !== undefined && eventFilter && !eventFilter(evt)) return
        const next = read(y)
        if (!equals(prev, next)) {
          prev = next
          set(next)
        }
      },
      { deep }
    )
  }

  const writer = atom(null, (_get, _set, update: Updater<T>) => {
    if (!write) return
    const current = read(y)
    const next = isUpdaterFn(update) ? update(current) : update
    if (equals(current, next)) return
    withTransact(y.doc, () => write(y, next), origin)
  })

  return atom(
    (get) => get(base),
    (_get, set, update: Updater<T>) => set(writer, update)
  )
}

/**
 * Y.Text atom exposing the whole string. Writes touch only the changed span.
 */
export function createYTextAtom(
  txt: Y.Text,
  opts?: { origin?: unknown }
): WritableAtom<string, [Updater<string>], void> {
  return createYAtom<Y.Text, string, Y.YTextEvent>({
    y: txt,
    read: (t) => t.toString(),
    write: (t, next) => {
      const { index, remove, insert } = diffText(t.toString(), next)
      if (remove > 0) t.delete(index, remove)
      if (insert.length > 0) t.insert(index, insert)
    },
    equals: (a, b) => a === b,
    origin: opts?.origin,
  })
}
