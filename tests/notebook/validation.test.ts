import { describe, it, expect } from "vitest";
import type { CellModel } from "@/notebook/core/types";
import { createCell } from "@/notebook/access/cells";
import { validateDocument } from "@/notebook/quality/validation";

describe("validateDocument", () => {
  it("accepts a well-formed list", () => {
    expect(validateDocument([createCell({ id: "a", kind: "code" })])).toEqual([]);
  });

  it("reports an empty list", () => {
    expect(validateDocument([])).toEqual([{ path: "cells", level: "error", message: "Document has no cells" }]);
  });

  it("reports duplicate ids with both positions", () => {
    const issues = validateDocument([
      createCell({ id: "a", kind: "code" }),
      createCell({ id: "b", kind: "code" }),
      createCell({ id: "a", kind: "raw" }),
    ]);
    expect(issues).toEqual([
      { path: "cells[2]", level: "error", message: 'Duplicate cell id "a" also present at cells[0]' },
    ]);
  });

  it("reports bad ids and sources coming from untyped input", () => {
    const broken: CellModel = JSON.parse('{"id":"","kind":"code","source":3,"outputs":[],"metadata":{}}');
    const issues = validateDocument([broken]);
    expect(issues.map((i) => i.path)).toEqual(["cells[0]", "cells[0].source"]);
  });
});
