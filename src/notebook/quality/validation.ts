import { isCellKind, type CellModel } from "../core/types";

export interface ValidationIssue {
  path: string;
  level: "error" | "warning";
  message: string;
}

/** 基本一致性校验：id 唯一性、kind 合法性、至少一个 cell */
export const validateDocument = (cells: readonly CellModel[]): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];

  if (cells.length === 0) {
    issues.push({
      path: "cells",
      level: "error",
      message: "Document has no cells",
    });
  }

  const seen = new Map<string, number>();
  cells.forEach((cell, idx) => {
    const id: unknown = cell.id;
    if (typeof id !== "string" || id.length === 0) {
      issues.push({
        path: `cells[${idx}]`,
        level: "error",
        message: `Invalid cell id at cells[${idx}]`,
      });
    } else {
      const dup = seen.get(id);
      if (dup !== undefined) {
        issues.push({
          path: `cells[${idx}]`,
          level: "error",
          message: `Duplicate cell id "${id}" also present at cells[${dup}]`,
        });
      } else {
        seen.set(id, idx);
      }
    }

    if (!isCellKind(cell.kind)) {
      issues.push({
        path: `cells[${idx}].kind`,
        level: "error",
        message: `Unknown cell kind "${String(cell.kind)}"`,
      });
    }

    if (typeof cell.source !== "string") {
      issues.push({
        path: `cells[${idx}].source`,
        level: "error",
        message: `Cell source must be a string`,
      });
    }
  });

  return issues;
};
