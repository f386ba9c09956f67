import { DiagnosticSeverity, SymbolKind } from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { describe, expect, it } from "vitest";
import { MiniYamlDatabase } from "./database";
import {
  DIAGNOSTIC_SOURCE,
  byteSpanOfRange,
  scalarToUtf16Column,
  toCorePosition,
  toDocumentSymbol,
  toLspDiagnostic,
  toLspPosition,
  utf16ToScalarColumn,
} from "./lspConvert";

const URI = "file:///a.yaml";

describe("column conversion", () => {
  it("counts surrogate pairs as one scalar value", () => {
    expect(utf16ToScalarColumn("a😀b", 3)).toBe(2);
    expect(scalarToUtf16Column("a😀b", 2)).toBe(3);
  });

  it("clamps to the end of the line", () => {
    expect(utf16ToScalarColumn("ab", 10)).toBe(2);
    expect(scalarToUtf16Column("a😀", 10)).toBe(3);
  });
});

describe("positions", () => {
  const db = new MiniYamlDatabase();
  const fileId = db.addFile(URI, "a😀b: x\n");

  it("converts UTF-16 client positions", () => {
    expect(toCorePosition(db, fileId, { line: 0, character: 3 }, "utf-16")).toEqual({
      line: 0,
      character: 2,
    });
    expect(toLspPosition(db, fileId, { line: 0, character: 2 }, "utf-16")).toEqual({
      line: 0,
      character: 3,
    });
  });

  it("passes UTF-32 positions through", () => {
    expect(toCorePosition(db, fileId, { line: 0, character: 3 }, "utf-32")).toEqual({
      line: 0,
      character: 3,
    });
  });

  it("has no core position on a line that does not exist", () => {
    expect(toCorePosition(db, fileId, { line: 5, character: 0 }, "utf-16")).toBeUndefined();
  });
});

describe("toLspDiagnostic", () => {
  it("converts a warning", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile(URI, "😀\rB:\n");
    const [diagnostic] = db.fileDiagnostics(fileId) ?? [];

    expect(toLspDiagnostic(db, URI, fileId, diagnostic, "utf-16")).toEqual({
      range: { start: { line: 0, character: 2 }, end: { line: 0, character: 3 } },
      severity: DiagnosticSeverity.Warning,
      code: "W0004",
      source: DIAGNOSTIC_SOURCE,
      message: "Invalid newline sequence: `\\r` not followed by `\\n`",
    });
  });

  it("folds notes into the message and turns labels into related information", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile(URI, "Key@: x\n");
    const [diagnostic] = db.fileDiagnostics(fileId) ?? [];

    expect(toLspDiagnostic(db, URI, fileId, diagnostic, "utf-16")).toEqual({
      range: { start: { line: 0, character: 3 }, end: { line: 0, character: 4 } },
      severity: DiagnosticSeverity.Error,
      code: "E0103",
      source: DIAGNOSTIC_SOURCE,
      message:
        "Expected an identifier or a number after `@`\nnote: `@` separates a key from its suffix, as in `Name@Suffix`",
      relatedInformation: [
        {
          location: {
            uri: URI,
            range: { start: { line: 0, character: 4 }, end: { line: 0, character: 5 } },
          },
          message: "found this instead",
        },
      ],
    });
  });

  it("places a diagnostic without a span at the start of the file", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile(URI, "A:\n");
    const converted = toLspDiagnostic(
      db,
      URI,
      fileId,
      { severity: "bug", code: "B0201", message: "lost", labels: [], children: [] },
      "utf-16",
    );
    expect(converted.range).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 0 } });
    expect(converted.severity).toBe(DiagnosticSeverity.Error);
  });
});

describe("toDocumentSymbol", () => {
  it("marks symbols with children as objects", () => {
    const db = new MiniYamlDatabase();
    const fileId = db.addFile(URI, "😀A:\n    B: 1\n");
    const [symbol] = db.symbolsIn(fileId) ?? [];
    const converted = toDocumentSymbol(db, fileId, symbol, "utf-16");

    expect(converted.kind).toBe(SymbolKind.Object);
    expect(converted.name).toBe("😀A");
    expect(converted.range).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 4 } });
    expect(converted.children?.map((child) => [child.name, child.kind, child.detail])).toEqual([
      ["B", SymbolKind.Property, "1"],
    ]);
  });
});

describe("byteSpanOfRange", () => {
  const document = TextDocument.create(URI, "miniyaml", 1, "😀: x\nB: y\n");

  it("measures a UTF-16 range in bytes", () => {
    expect(
      byteSpanOfRange(document, { start: { line: 0, character: 4 }, end: { line: 0, character: 5 } }, "utf-16"),
    ).toEqual({
      start: 6,
      end: 7,
      utf16Range: { start: { line: 0, character: 4 }, end: { line: 0, character: 5 } },
    });
  });

  it("measures a UTF-32 range in bytes", () => {
    expect(
      byteSpanOfRange(document, { start: { line: 0, character: 3 }, end: { line: 1, character: 1 } }, "utf-32"),
    ).toEqual({
      start: 6,
      end: 9,
      utf16Range: { start: { line: 0, character: 4 }, end: { line: 1, character: 1 } },
    });
  });
});
