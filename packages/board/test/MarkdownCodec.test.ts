import { describe, it, expect } from "vitest";
import { MarkdownCodec, formatDate } from "../src/infrastructure/codec/MarkdownCodec.js";
import type { Board, Card } from "../src/core/model.js";

const PARSE_TIME = new Date("2024-02-01T09:00:00Z");
const codec = new MarkdownCodec(() => PARSE_TIME);

const card: Card = {
  title: "Fix bug",
  column: "todo",
  position: "n",
  created: new Date("2024-01-05T10:00:00Z"),
  modified: new Date("2024-01-06T08:30:00Z"),
  labels: ["bug", "urgent"],
  body: "Steps:\n1. Open the app",
};

describe("MarkdownCodec", () => {
  describe("cards", () => {
    it("writes frontmatter, a blank line, then the body", () => {
      const text = codec.serializeCard(card);

      expect(text.startsWith("---\ntitle: Fix bug\ncolumn: todo\n")).toBe(true);
      expect(text.endsWith("\n---\n\nSteps:\n1. Open the app\n")).toBe(true);
    });

    it("parses what it serializes", () => {
      expect(codec.parseCard(codec.serializeCard(card))).toEqual({ ok: true, value: card });
    });

    it("keeps labels that contain commas", () => {
      const labelled = { ...card, labels: ["ui, ux", "p1"] };

      const parsed = codec.parseCard(codec.serializeCard(labelled));

      expect(parsed.ok && parsed.value.labels).toEqual(["ui, ux", "p1"]);
    });

    it("keeps titles with colons, quotes, hashes and surrounding spaces", () => {
      for (const title of ['Meeting: "sync" notes', "#1 priority", " padded ", "Bob's list", "123", "true"]) {
        const parsed = codec.parseCard(codec.serializeCard({ ...card, title }));
        expect(parsed.ok && parsed.value.title).toBe(title);
      }
    });

    it("keeps positions that look like numbers or booleans", () => {
      for (const position of ["1", "y", "no", "null"]) {
        const parsed = codec.parseCard(codec.serializeCard({ ...card, position }));
        expect(parsed.ok && parsed.value.position).toBe(position);
      }
    });

    it("writes empty labels and no body", () => {
      const text = codec.serializeCard({ ...card, labels: [], body: "" });
      expect(text.endsWith("labels: []\n---\n\n")).toBe(true);

      const parsed = codec.parseCard(text);
      expect(parsed.ok && parsed.value.body).toBe("");
    });

    it("drops milliseconds from dates", () => {
      expect(formatDate(new Date("2024-01-05T10:00:00.123Z"))).toBe("2024-01-05T10:00:00Z");
    });

    it("reads unquoted timestamps written by hand", () => {
      const parsed = codec.parseCard(
        "---\ntitle: T\ncolumn: todo\nposition: n\ncreated: 2024-01-05T10:00:00Z\n---\n"
      );
      expect(parsed.ok && parsed.value.created).toEqual(new Date("2024-01-05T10:00:00Z"));
    });

    it("falls back to the parse time for missing or invalid dates", () => {
      const parsed = codec.parseCard("---\ntitle: T\ncolumn: todo\nposition: n\ncreated: yesterday\n---\n");
      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(parsed.value.created).toEqual(PARSE_TIME);
        expect(parsed.value.modified).toEqual(PARSE_TIME);
        expect(parsed.value.labels).toEqual([]);
        expect(parsed.value.body).toBe("");
      }
    });

    it("reads flow-style label lists and trims the body", () => {
      const parsed = codec.parseCard("---\ntitle: T\ncolumn: todo\nposition: n\nlabels: [a, b]\n---\n\n  body  \n\n");
      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(parsed.value.labels).toEqual(["a", "b"]);
        expect(parsed.value.body).toBe("body");
      }
    });

    it("requires frontmatter", () => {
      expect(codec.parseCard("just text")).toEqual({ ok: false, error: { kind: "missingFrontmatter" } });
      expect(codec.parseCard("")).toEqual({ ok: false, error: { kind: "missingFrontmatter" } });
    });

    it("reads an unclosed header to the end of the file", () => {
      expect(codec.parseCard("---\ntitle: T\ncolumn: todo")).toEqual({
        ok: false,
        error: { kind: "missingRequiredField", field: "position" },
      });
    });

    it("reports frontmatter that is not valid YAML", () => {
      const parsed = codec.parseCard("---\ntitle: [unclosed\n---\n");
      expect(parsed.ok || parsed.error.kind).toBe("invalidFrontmatter");
    });

    it("reports fields of the wrong shape", () => {
      const parsed = codec.parseCard("---\ntitle:\n  nested: value\ncolumn: todo\nposition: n\n---\n");
      expect(parsed.ok || parsed.error.kind).toBe("invalidFrontmatter");
    });

    it("requires title, column and position", () => {
      expect(codec.parseCard("---\ncolumn: todo\nposition: n\n---\n")).toEqual({
        ok: false,
        error: { kind: "missingRequiredField", field: "title" },
      });
      expect(codec.parseCard("---\ntitle: T\nposition: n\n---\n")).toEqual({
        ok: false,
        error: { kind: "missingRequiredField", field: "column" },
      });
      expect(codec.parseCard("---\ntitle: T\ncolumn: todo\nposition:\n---\n")).toEqual({
        ok: false,
        error: { kind: "missingRequiredField", field: "position" },
      });
    });
  });

  describe("boards", () => {
    const board: Board = {
      title: "Home",
      columns: [
        { id: "todo", name: "To Do" },
        { id: "done", name: "Done" },
      ],
      labels: [{ id: "bug", name: "Bug", color: "#e74c3c" }],
      cardTemplate: "## Notes",
    };

    it("writes columns as a list of id and name entries", () => {
      const text = codec.serializeBoard(board);

      expect(text.startsWith("---\ntitle: Home\ncolumns:\n  - id: todo\n    name: To Do\n  - id: done\n    name: Done\n")).toBe(
        true
      );
      expect(text.endsWith("\n---\n\n## Notes\n")).toBe(true);
    });

    it("parses what it serializes", () => {
      expect(codec.parseBoard(codec.serializeBoard(board))).toEqual({ ok: true, value: board });
    });

    it("keeps titles with colons", () => {
      const parsed = codec.parseBoard(codec.serializeBoard({ ...board, title: "Q1: Plans" }));
      expect(parsed.ok && parsed.value.title).toBe("Q1: Plans");
    });

    it("omits the labels block when there are none", () => {
      const text = codec.serializeBoard({ ...board, labels: [], cardTemplate: "" });
      expect(text).not.toContain("labels:");
      expect(codec.parseBoard(text)).toEqual({ ok: true, value: { ...board, labels: [], cardTemplate: "" } });
    });

    it("requires a title and at least one column", () => {
      expect(codec.parseBoard("---\ncolumns:\n  - id: todo\n    name: To Do\n---\n")).toEqual({
        ok: false,
        error: { kind: "missingRequiredField", field: "title" },
      });
      expect(codec.parseBoard("---\ntitle: Empty\n---\n")).toEqual({
        ok: false,
        error: { kind: "missingRequiredField", field: "columns" },
      });
    });

    it("skips column and label entries with missing fields", () => {
      const parsed = codec.parseBoard(
        "---\ntitle: B\ncolumns:\n  - id: todo\n  - id: done\n    name: Done\nlabels:\n  - id: bug\n    name: Bug\n---\n"
      );
      expect(parsed.ok && parsed.value.columns).toEqual([{ id: "done", name: "Done" }]);
      expect(parsed.ok && parsed.value.labels).toEqual([]);
    });
  });
});
