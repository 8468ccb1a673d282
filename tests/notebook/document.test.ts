import { describe, it, expect } from "vitest";
import { NotebookDocument } from "@/notebook/document";
import { cellsToLines } from "@/notebook/access/layout";
import { idCounter } from "../_helpers/session";

const makeDoc = () =>
  new NotebookDocument({
    cells: [
      { id: "a", kind: "code", source: "x = 1" },
      { id: "b", kind: "markdown", source: "notes" },
    ],
    generateId: idCounter(),
  });

describe("NotebookDocument", () => {
  it("starts with one empty code cell and the default language", () => {
    const doc = new NotebookDocument({ generateId: idCounter() });
    expect(doc.length).toBe(1);
    expect(doc.at(0)).toMatchObject({ id: "id-1", kind: "code", source: "" });
    expect(doc.language).toBe("python");
  });

  it("re-mints duplicate ids handed over by a serializer", () => {
    const doc = new NotebookDocument({
      cells: [
        { id: "a", kind: "code", source: "1" },
        { id: "a", kind: "code", source: "2" },
      ],
      generateId: idCounter(),
    });
    expect(doc.cells().map((c) => c.id)).toEqual(["a", "id-1"]);
    expect(doc.validate()).toEqual([]);
  });

  it("inserts from a string or from lines", () => {
    const doc = makeDoc();
    const id = doc.insertCell(1, "markdown", ["# a", "b"]);
    expect(id).toBe("id-1");
    expect(doc.indexOf(id)).toBe(1);
    expect(doc.getCell(id)?.source).toBe("# a\nb");
    expect(() => doc.insertCell(1.5, "code")).toThrow("Invalid cell index: 1.5");
  });

  it("refuses to delete the last cell", () => {
    const doc = makeDoc();
    expect(doc.deleteCell("a")).toBe(true);
    expect(doc.deleteCell("b")).toBe(false);
    expect(doc.deleteCell("missing")).toBe(false);
    expect(doc.length).toBe(1);
  });

  it("snapshots never alias the live cells", () => {
    const doc = makeDoc();
    const copy = doc.cells();
    const first = copy[0];
    if (first) first.source = "changed";
    expect(doc.getCell("a")?.source).toBe("x = 1");
  });

  it("kind changes drop outputs on non-code cells", () => {
    const doc = makeDoc();
    doc.setOutputs("a", [{ text: "1" }]);
    expect(doc.setCellKind("a", "raw")).toBe(true);
    expect(doc.getCell("a")?.outputs).toEqual([]);
    expect(doc.setCellKind("a", "raw")).toBe(false);
  });

  it("setCellSource reports whether the content changed", () => {
    const doc = makeDoc();
    expect(doc.setCellSource("a", ["x = 1"])).toBe(false);
    expect(doc.setCellSource("a", ["x = 1", "x += 1"])).toBe(true);
    expect(doc.getCell("a")?.source).toBe("x = 1\nx += 1");
    expect(doc.setCellSource("missing", "")).toBe(false);
  });

  it("remembers deleted cells so reconcile can bring their ids back", () => {
    const doc = makeDoc();
    const before = cellsToLines(doc.cells());
    doc.deleteCell("b");
    const report = doc.reconcile(before);
    expect(report.revived).toEqual(["b"]);
    expect(doc.cells().map((c) => c.id)).toEqual(["a", "b"]);
  });

  it("rejects an empty language", () => {
    const doc = makeDoc();
    expect(() => doc.setLanguage("")).toThrow("Language must be a non-empty string");
    expect(doc.setLanguage("python")).toBe(false);
    expect(doc.setLanguage("julia")).toBe(true);
    expect(doc.toModel().metadata.language).toBe("julia");
  });
});
