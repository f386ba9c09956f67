import { describe, expect, it } from "vitest";
import { MiniYamlDatabase } from "./database";
import { BoundsError, ReadOnlySnapshotError, UnknownFileError } from "./errors";
import type { QueryEvent } from "./queryEngine";

describe("MiniYamlDatabase", () => {
  it("finds the token and node under a byte offset", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("rules/infantry.yaml", "E1:\n\tTooltip:\n\t\tName: Standard Infantry\n");

    expect(db.tokenSpanningByteIndex(fileId, 24)?.text).toBe("Standard");
    expect(db.nodeSpanningByteIndex(fileId, 24)?.node.keyText()).toBe("Name");
    expect(db.tokenSpanningByteIndex(fileId, 500)).toBeUndefined();
  });

  it("hands out file ids in order and never reuses them", () => {
    const db = new MiniYamlDatabase();
    const first = db.addFile("a.yaml", "A:\n");
    const second = db.addFile("b.yaml", "B:\n");
    db.removeFile(first);
    const third = db.addFile("c.yaml", "C:\n");

    expect([first, second, third]).toEqual([0, 1, 2]);
    expect(db.allFileIds()).toEqual([1, 2]);
    expect(db.fileText(first)).toBeUndefined();
    expect(db.fileName(third)).toBe("c.yaml");
    expect(db.fileIdOfName("b.yaml")).toBe(1);
    expect(db.fileIdOfName("a.yaml")).toBeUndefined();
  });

  it("applies edits one after another", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "Name: a\n");

    db.applyEdit(fileId, [
      { span: { start: 0, end: 4 }, text: "Key" },
      {
        range: { start: { line: 0, character: 5 }, end: { line: 0, character: 6 } },
        text: "xyz",
      },
    ]);
    expect(db.fileText(fileId)).toBe("Key: xyz\n");
    expect(db.fileNodes(fileId)?.[0].valueText()).toBe(" xyz");
  });

  it("inserts text at the end of the file", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "A:\n");
    db.applyEdit(fileId, [
      { range: { start: { line: 1, character: 0 }, end: { line: 1, character: 0 } }, text: "B:\n" },
    ]);
    expect(db.fileText(fileId)).toBe("A:\nB:\n");
  });

  it("applies nothing when any edit is out of range", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "Name: é\n");

    expect(() =>
      db.applyEdit(fileId, [
        { span: { start: 0, end: 4 }, text: "Key" },
        { span: { start: 6, end: 7 }, text: "e" },
      ]),
    ).toThrow(BoundsError);
    expect(() =>
      db.applyEdit(fileId, [
        { range: { start: { line: 4, character: 0 }, end: { line: 4, character: 0 } }, text: "x" },
      ]),
    ).toThrow(BoundsError);
    expect(db.fileText(fileId)).toBe("Name: é\n");
  });

  it("refuses to edit a file it does not track", () => {
    const db = new MiniYamlDatabase();
    expect(() => db.applyEdit(7, [])).toThrow(UnknownFileError);
    expect(() => db.setFileText(7, "")).toThrow(UnknownFileError);
    expect(() => db.removeFile(7)).toThrow(UnknownFileError);
  });

  it("collects diagnostics from every stage in pipeline order", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "A\rB:\n  C:\n");
    expect(db.fileDiagnostics(fileId)?.map((d) => d.code)).toEqual(["W0004", "E0202", "E0203"]);
  });

  it("answers queries for removed files with nothing", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "A:\n");
    db.removeFile(fileId);
    expect(db.fileTokens(fileId)).toBeUndefined();
    expect(db.fileTree(fileId)).toBeUndefined();
    expect(db.fileDiagnostics(fileId)).toBeUndefined();
    expect(db.symbolsIn(fileId)).toBeUndefined();
  });

  it("drops the memos of a removed file", () => {
    const db = new MiniYamlDatabase();
    const a = db.addFile("a.yaml", "A: 1\n");
    const b = db.addFile("b.yaml", "B: 2\n");
    db.fileDiagnostics(a);
    db.fileDiagnostics(b);
    db.byteIndexToPosition(a, 3);
    expect(db.runtime.memoCounts().get("builtTree")).toBe(2);
    expect(db.runtime.memoCounts().get("byteIndexToPosition")).toBe(1);

    db.removeFile(a);
    const counts = db.runtime.memoCounts();
    expect(counts.get("lexedFile")).toBe(1);
    expect(counts.get("builtTree")).toBe(1);
    expect(counts.get("fileDiagnostics")).toBe(1);
    expect(counts.get("lineStartOffsets")).toBe(0);
    expect(counts.get("byteIndexToPosition")).toBe(0);

    const events: QueryEvent[] = [];
    db.runtime.onEvent = (event) => events.push(event);
    expect(db.fileDiagnostics(b)).toEqual([]);
    expect(events.filter((e) => e.kind === "execute")).toEqual([]);
  });

  it("finds a file under its new name", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "A:\n");
    expect(db.fileIdOfName("a.yaml")).toBe(fileId);

    db.setFileName(fileId, "renamed.yaml");
    expect(db.fileName(fileId)).toBe("renamed.yaml");
    expect(db.fileIdOfName("renamed.yaml")).toBe(fileId);
    expect(db.fileIdOfName("a.yaml")).toBeUndefined();
    expect(() => db.setFileName(9, "x.yaml")).toThrow(UnknownFileError);
  });

  it("lists keyed top-level nodes", () => {
    const db = new MiniYamlDatabase();
    const a = db.addFile("a.yaml", "A:\n    B:\n# c\nC: 1\n");
    const b = db.addFile("b.yaml", "D:\n");

    expect(db.topLevelNodes(a)?.map((ref) => ref.node.keyText())).toEqual(["A", "C"]);
    expect(db.topLevelNodeByKey(a, "C")?.node.valueText()).toBe(" 1");
    expect(db.topLevelNodeByKey(a, "B")).toBeUndefined();
    expect(
      db.topLevelNodesInAllFiles().map((ref) => [ref.fileId, ref.node.keyText()]),
    ).toEqual([
      [a, "A"],
      [a, "C"],
      [b, "D"],
    ]);
  });

  it("finds the first definition of a key across files", () => {
    const db = new MiniYamlDatabase();
    db.addFile("a.yaml", "Other:\n");
    const b = db.addFile("b.yaml", "Foo:\n");
    db.addFile("c.yaml", "Foo: again\n");
    expect(db.definitionSpan("Foo")).toEqual({ fileId: b, start: 0, end: 3 });
    expect(db.definitionSpan("Bar")).toBeUndefined();
  });

  it("converts between byte offsets and positions", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "A: é\nB: x\n");
    expect(db.lineStartOffsets(fileId)).toEqual([0, 6, 11]);
    expect(db.byteIndexToPosition(fileId, 8)).toEqual({ line: 1, character: 2 });
    expect(db.positionToByteIndex(fileId, { line: 0, character: 4 })).toBe(5);
    expect(db.spanToRange({ fileId, start: 3, end: 5 })).toEqual({
      start: { line: 0, character: 3 },
      end: { line: 0, character: 4 },
    });
    expect(db.spanToRange({ fileId, start: 4, end: 5 })).toBeUndefined();
  });

  it("does not re-lex files whose text did not change", () => {
    const db = new MiniYamlDatabase();
    const a = db.addFile("a.yaml", "A: 1\n");
    const b = db.addFile("b.yaml", "B: 2\n");
    db.fileTokens(a);
    db.fileTokens(b);

    const events: QueryEvent[] = [];
    db.runtime.onEvent = (event) => events.push(event);
    db.setFileText(b, "B: 3\n");
    db.fileTokens(a);
    db.fileTokens(b);

    expect(events.filter((e) => e.kind === "execute").map((e) => `${e.query}(${e.keyId})`)).toEqual([
      `lexedFile(${b})`,
      `fileTokens(${b})`,
    ]);
  });

  it("keeps snapshots as they were and read-only", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile("a.yaml", "A: 1\n");
    const snapshot = db.snapshot();

    db.setFileText(fileId, "A: 2\n");
    expect(snapshot.isSnapshot).toBe(true);
    expect(snapshot.fileText(fileId)).toBe("A: 1\n");
    expect(snapshot.topLevelNodes(fileId)?.[0].node.valueText()).toBe(" 1");
    expect(db.topLevelNodes(fileId)?.[0].node.valueText()).toBe(" 2");

    expect(() => snapshot.addFile("b.yaml", "")).toThrow(ReadOnlySnapshotError);
    expect(() => snapshot.setFileText(fileId, "A: 3\n")).toThrow(ReadOnlySnapshotError);
  });

  it("looks up traits in the type data", () => {
    const db = new MiniYamlDatabase();
    expect(db.traitByName("Health")).toBeUndefined();

    db.setTypeData([{ Name: "Health", Properties: [], DocLines: ["Hit points."] }]);
    expect(db.traitByName("Health@Extra")?.DocLines).toEqual(["Hit points."]);

    db.setTypeData(undefined);
    expect(db.typeData()).toBeUndefined();
    expect(db.traitByName("Health")).toBeUndefined();
  });
});
