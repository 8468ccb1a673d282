import { atom } from 'jotai/vanilla'
import { isEqual } from 'es-toolkit/compat'
import type { CellModel } from '@/notebook/core/types'
import type { NotebookSession } from '@/sync/synchronizer'
import type { UndoStatus } from '@/sync/undo'
import { createYTextAtom } from './yJotai'

export type OverlaySnapshot = {
  cellId: string
  regionStart: number
  regionEnd: number
  lines: string[]
  epoch: number
}

const snapshotOverlay = (session: NotebookSession): OverlaySnapshot | null => {
  const ov = session.overlay
  return ov
    ? { cellId: ov.cellId, regionStart: ov.regionStart, regionEnd: ov.regionEnd, lines: [...ov.lines], epoch: ov.epoch }
    : null
}

/**
 * UI-facing atoms for one session. Cell and overlay snapshots refresh on the
 * batched `view-changed` notification, so they settle once per cycle.
 */
export const createSessionAtoms = (session: NotebookSession) => {
  const humanTextAtom = createYTextAtom(session.human.text)
  const humanLinesAtom = atom((get) => get(humanTextAtom).split('\n'))

  const cellsAtom = atom<CellModel[]>(session.document.cells())
  cellsAtom.onMount = (set) => {
    let prev = session.document.cells()
    set(prev)
    return session.on('view-changed', () => {
      const next = session.document.cells()
      if (isEqual(prev, next)) return
      prev = next
      set(next)
    })
  }

  const overlayAtom = atom<OverlaySnapshot | null>(snapshotOverlay(session))
  overlayAtom.onMount = (set) => {
    const sync = () => set((prev) => {
      const next = snapshotOverlay(session)
      return isEqual(prev, next) ? prev : next
    })
    sync()
    const offs = [
      session.on('overlay-opened', sync),
      session.on('overlay-closed', sync),
      session.on('view-changed', sync),
    ]
    return () => offs.forEach((off) => off())
  }

  const undoStatusAtom = atom<UndoStatus>(session.undoHistory.status())
  undoStatusAtom.onMount = (set) => {
    set(session.undoHistory.status())
    return session.undoHistory.subscribe(set)
  }

  const undoAtom = atom(null, () => {
    session.undo()
  })
  const redoAtom = atom(null, () => {
    session.redo()
  })

  return { humanTextAtom, humanLinesAtom, cellsAtom, overlayAtom, undoStatusAtom, undoAtom, redoAtom }
}

export type SessionAtoms = ReturnType<typeof createSessionAtoms>
