import * as path from "node:path";

import { errorMessage, logEvent } from "../shared/log.js";
import { install, uninstall, update } from "./installer.js";
import { assetKey, type AssetCategory, type OperationResult, type PlannedOperation } from "./types.js";

function targetOf(op: PlannedOperation): { category: AssetCategory; name: string } {
  return op.kind === "uninstall" ? { category: op.category, name: op.name } : { category: op.asset.category, name: op.asset.name };
}

function runOne(op: PlannedOperation): OperationResult {
  switch (op.kind) {
    case "install":
      return install(op.asset, op.root, op.activate === undefined ? {} : { activate: op.activate });
    case "update":
      return update(op.asset, op.root);
    case "uninstall":
      return uninstall(op.category, op.name, op.root);
  }
}

/**
 * Runs every planned operation in order and returns one result per input, in
 * input order. A failure never stops the batch. A second operation on the same
 * asset and root is skipped.
 */
export function runBulk(operations: readonly PlannedOperation[]): OperationResult[] {
  const firstIndexByTarget = new Map<string, number>();
  const results: OperationResult[] = [];

  operations.forEach((op, index) => {
    const { category, name } = targetOf(op);
    const key = assetKey(category, name);
    const target = `${key}@${path.resolve(op.root.path)}`;

    const earlier = firstIndexByTarget.get(target);
    if (earlier !== undefined) {
      results.push({
        operation: op.kind,
        assetKey: key,
        rootPath: op.root.path,
        outcome: "skipped",
        message: `Skipped ${op.kind} of ${key} in ${op.root.path}: operation #${earlier} already targets it in this batch`,
      });
      return;
    }
    firstIndexByTarget.set(target, index);

    try {
      results.push(runOne(op));
    } catch (err) {
      logEvent("error", "bulk-operation-crashed", { index, operation: op.kind, asset: key, error: errorMessage(err) });
      results.push({
        operation: op.kind,
        assetKey: key,
        rootPath: op.root.path,
        outcome: "failed",
        message: `Could not ${op.kind} ${key} in ${op.root.path}: ${errorMessage(err)}`,
        failure: "io-error",
      });
    }
  });

  const failed = results.filter((r) => r.outcome === "failed").length;
  logEvent(failed > 0 ? "warn" : "info", "bulk-finished", { total: results.length, failed });
  return results;
}
