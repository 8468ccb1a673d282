import { describe, it, expect } from "vitest";
import * as Y from "yjs";
import { UndoCoordinator } from "@/sync/undo";
import { INSERT_SESSION_ORIGIN, LOAD_ORIGIN, MAINT_ORIGIN, USER_ACTION_ORIGIN } from "@/notebook/core/origins";

const setup = (opts?: { captureTimeout?: number }) => {
  const doc = new Y.Doc();
  const text = doc.getText("human");
  const undo = new UndoCoordinator(text, opts);
  const write = (s: string, origin: unknown) => doc.transact(() => text.insert(text.length, s), origin);
  return { doc, text, undo, write };
};

describe("UndoCoordinator (small step)", () => {
  it("keeps discrete user actions as separate steps", () => {
    const { undo, write } = setup();
    write("a", USER_ACTION_ORIGIN);
    write("b", USER_ACTION_ORIGIN);
    expect(undo.status().undoDepth).toBe(2);
  });

  it("does not track load or maintenance writes", () => {
    const { undo, write } = setup();
    write("a", LOAD_ORIGIN);
    write("b", MAINT_ORIGIN);
    write("c", null);
    expect(undo.status()).toEqual({
      canUndo: false,
      canRedo: false,
      undoDepth: 0,
      redoDepth: 0,
      inInsertSession: false,
    });
  });

  it("an insertion session is one step however many writes it makes", () => {
    const { undo, write, text } = setup();
    undo.beginInsertSession();
    expect(undo.editOrigin).toBe(INSERT_SESSION_ORIGIN);
    write("a", INSERT_SESSION_ORIGIN);
    write("b", INSERT_SESSION_ORIGIN);
    write("c", INSERT_SESSION_ORIGIN);
    undo.endInsertSession();
    expect(undo.editOrigin).toBe(USER_ACTION_ORIGIN);
    expect(undo.status().undoDepth).toBe(1);

    expect(undo.undo()).toBe(true);
    expect(text.toString()).toBe("");
    expect(undo.status().redoDepth).toBe(1);
  });

  it("sessions separated by a command stay separate", () => {
    const { undo, write } = setup();
    undo.beginInsertSession();
    write("a", INSERT_SESSION_ORIGIN);
    undo.endInsertSession();
    undo.discrete(() => write("\n", USER_ACTION_ORIGIN));
    undo.beginInsertSession();
    write("b", INSERT_SESSION_ORIGIN);
    undo.endInsertSession();
    expect(undo.status().undoDepth).toBe(3);
  });

  it("discrete() folds several transactions into one step", () => {
    const { undo, write, text } = setup();
    write("x", USER_ACTION_ORIGIN);
    const result = undo.discrete(() => {
      write("1", USER_ACTION_ORIGIN);
      write("2", USER_ACTION_ORIGIN);
      return "done";
    });
    expect(result).toBe("done");
    expect(undo.status().undoDepth).toBe(2);
    undo.undo();
    expect(text.toString()).toBe("x");
  });

  it("nested discrete() calls join the outer step", () => {
    const { undo, write, text } = setup();
    undo.discrete(() => {
      undo.discrete(() => write("a", USER_ACTION_ORIGIN));
      undo.discrete(() => write("b", USER_ACTION_ORIGIN));
    });
    expect(undo.status().undoDepth).toBe(1);
    undo.undo();
    expect(text.toString()).toBe("");
  });

  it("commands inside the capture window merge into one step", () => {
    const { undo, write, text } = setup({ captureTimeout: 60_000 });
    undo.discrete(() => write("a", USER_ACTION_ORIGIN));
    undo.discrete(() => write("b", USER_ACTION_ORIGIN));
    expect(undo.status().undoDepth).toBe(1);
    undo.undo();
    expect(text.toString()).toBe("");
  });

  it("a command inside a session starts a new step but keeps the session open", () => {
    const { undo, write } = setup();
    undo.beginInsertSession();
    write("a", INSERT_SESSION_ORIGIN);
    undo.discrete(() => write("b", USER_ACTION_ORIGIN));
    write("c", INSERT_SESSION_ORIGIN);
    expect(undo.inInsertSession).toBe(true);
    undo.endInsertSession();
    expect(undo.status().undoDepth).toBe(3);
  });

  it("reports status changes to subscribers", () => {
    const { undo, write } = setup();
    const depths: number[] = [];
    const off = undo.subscribe((s) => depths.push(s.undoDepth));
    write("a", USER_ACTION_ORIGIN);
    expect(depths).toEqual([1]);
    undo.undo();
    expect(depths.at(-1)).toBe(0);

    const seen = depths.length;
    off();
    write("b", USER_ACTION_ORIGIN);
    expect(depths).toHaveLength(seen);
  });

  it("undo and redo report when there is nothing to do", () => {
    const { undo } = setup();
    expect(undo.undo()).toBe(false);
    expect(undo.redo()).toBe(false);
  });
});
