import { describe, it, expect } from "vitest";
import { NotebookDocument } from "@/notebook/document";
import { cellsToLines } from "@/notebook/access/layout";
import { project, projectContent, projectRegion } from "@/shadow/projector";
import { languageExtension } from "@/shadow/language";

const makeDoc = () =>
  new NotebookDocument({
    cells: [
      { id: "c1", kind: "code", source: "a\nb" },
      { id: "m1", kind: "markdown", source: "m\nn" },
      { id: "r1", kind: "raw", source: "r" },
    ],
  });

describe("shadow projection", () => {
  it("keeps code, blanks everything else, line for line", () => {
    const doc = makeDoc();
    const shadow = project(doc);
    expect(shadow).toEqual(["", "a", "b", "", "", "", "", "", "", "", ""]);
    expect(shadow).toHaveLength(cellsToLines(doc.cells()).length);
  });

  it("projects a single region by the cell's kind", () => {
    const doc = makeDoc();
    expect(projectRegion(doc, "c1", ["x", "y"])).toEqual(["x", "y"]);
    expect(projectRegion(doc, "m1", ["x", "y", "z"])).toEqual(["", "", ""]);
    expect(projectRegion(doc, "missing", ["x"])).toBeUndefined();
    expect(projectContent("raw", ["q"])).toEqual([""]);
  });

  it("maps languages to extensions", () => {
    expect(languageExtension("python")).toBe(".py");
    expect(languageExtension(" Julia ")).toBe(".jl");
    expect(languageExtension("kotlin")).toBe(".kt");
    expect(languageExtension("haskell")).toBe(".haskell");
  });
});
