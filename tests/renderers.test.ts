import { describe, expect, it } from "vitest";
import { LineRenderer, TableRenderer, TitleRenderer, createRenderer, renderPlainLines } from "../src/render";
import { ExtractedRecord } from "../src/types";

const RECORDS: ExtractedRecord[] = [
  { rank: "1.", title: "Story A", url: "http://a" },
  { rank: "2.", title: "Story B", url: "http://b" },
];

function tableCells(rendered: string): string[] {
  return rendered
    .split("\n")
    .filter((line) => line.includes("│"))
    .map((line) => line.replace(/│/g, "").trim());
}

describe("LineRenderer", () => {
  it("renders one block per record in order", () => {
    expect(new LineRenderer().render(RECORDS)).toBe("1. | Story A\nhttp://a\n\n2. | Story B\nhttp://b\n");
  });

  it("omits the rank column when a record has none", () => {
    expect(new LineRenderer().render([{ title: "Story A", url: "http://a" }])).toBe("Story A\nhttp://a\n");
  });

  it("renders nothing for no records", () => {
    expect(new LineRenderer().render([])).toBe("");
  });

  it("produces identical output on every call", () => {
    const renderer = new LineRenderer();
    expect(renderer.render(RECORDS)).toBe(renderer.render(RECORDS));
  });
});

describe("TitleRenderer", () => {
  it("renders one title per line", () => {
    expect(new TitleRenderer().render(RECORDS)).toBe("Story A\nStory B\n");
  });
});

describe("TableRenderer", () => {
  it("renders a title row then a link row per record", () => {
    const rendered = new TableRenderer({ color: false }).render(RECORDS);
    expect(tableCells(rendered)).toEqual(["Story A", "http://a", "Story B", "http://b"]);
  });

  it("does not render a header row", () => {
    const rendered = new TableRenderer({ color: false }).render(RECORDS);
    expect(rendered.split("\n")[1]).toContain("Story A");
  });

  it("writes no escape codes when colour is off", () => {
    const rendered = new TableRenderer({ color: false }).render(RECORDS);
    expect(rendered.includes("\u001b[")).toBe(false);
  });

  it("styles the title row and the link row", () => {
    const lines = new TableRenderer({ color: true, colorLevel: 1 }).render(RECORDS).split("\n");
    const titleLine = lines.find((line) => line.includes("Story A"));
    const linkLine = lines.find((line) => line.includes("http://a"));

    expect(titleLine).toContain("\u001b[30m\u001b[43m\u001b[1mStory A\u001b[22m\u001b[49m\u001b[39m");
    expect(linkLine).toContain("\u001b[33mhttp://a\u001b[39m");
  });

  it("ignores the colour level when colour is off", () => {
    const rendered = new TableRenderer({ color: false, colorLevel: 3 }).render(RECORDS);
    expect(rendered.includes("\u001b[")).toBe(false);
  });

  it("renders nothing for no records", () => {
    expect(new TableRenderer({ color: false }).render([])).toBe("");
  });

  it("produces identical output on every call", () => {
    const renderer = new TableRenderer({ color: false });
    expect(renderer.render(RECORDS)).toBe(renderer.render(RECORDS));
  });
});

describe("createRenderer", () => {
  it("builds the renderer for each kind", () => {
    expect(createRenderer("lines", { color: false })).toBeInstanceOf(LineRenderer);
    expect(createRenderer("table", { color: false })).toBeInstanceOf(TableRenderer);
    expect(createRenderer("titles", { color: false })).toBeInstanceOf(TitleRenderer);
  });
});

describe("renderPlainLines", () => {
  it("terminates every value with a newline", () => {
    expect(renderPlainLines(["a", "", "b"])).toBe("a\n\nb\n");
    expect(renderPlainLines([])).toBe("");
  });
});
