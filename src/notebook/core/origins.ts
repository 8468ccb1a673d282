export const USER_ACTION_ORIGIN = Symbol("USER_ACTION"); // discrete user command (undoable)
export const INSERT_SESSION_ORIGIN = Symbol("INSERT_SESSION"); // overlay typing (undoable, coalesced)
export const LOAD_ORIGIN = Symbol("LOAD"); // initial population (not undo)
export const MAINT_ORIGIN = Symbol("MAINTENANCE"); // normalisation after reconcile (not undo)
