import { describe, expect, it } from "vitest";

import { concat } from "@colloquy/codec";

import {
  hyperlink,
  mention,
  message,
  paragraph,
  plainMessage,
  popFormat,
  pushFormat,
  text,
} from "./builder.ts";
import { ValidationError } from "./error.ts";
import { FormatFlags } from "./frame.ts";
import { type Renderer, render, renderText } from "./render.ts";

/** Writes every renderer call down as a line. */
class CallLog implements Renderer<string[]> {
  calls: string[] = [];

  beginParagraph(): void {
    this.calls.push("begin");
  }

  endParagraph(): void {
    this.calls.push("end");
  }

  text(value: string): void {
    this.calls.push(`text ${value}`);
  }

  pushFormat(format: number, current: number): void {
    this.calls.push(`push ${format} -> ${current}`);
  }

  popFormat(format: number, current: number): void {
    this.calls.push(`pop ${format} -> ${current}`);
  }

  hyperlink(label: string | null, url: string): void {
    this.calls.push(`link ${label ?? "-"} ${url}`);
  }

  mention(user: number): void {
    this.calls.push(`mention ${user}`);
  }

  finish(): string[] {
    return this.calls;
  }
}

const { EMPHASIS, STRONG } = FormatFlags;

describe("render", () => {
  it("reports content in order", () => {
    const body = message(
      paragraph(text("hi "), mention(7), hyperlink("docs", "https://example.com")),
      paragraph(hyperlink(null, "https://example.org")),
    );

    expect(render(body, new CallLog())).toEqual([
      "begin",
      "text hi ",
      "mention 7",
      "link docs https://example.com",
      "end",
      "begin",
      "link - https://example.org",
      "end",
    ]);
  });

  it("only reports format changes", () => {
    const body = message(
      paragraph(
        pushFormat(EMPHASIS),
        pushFormat(EMPHASIS | STRONG),
        text("x"),
        popFormat(STRONG),
        popFormat(STRONG),
        popFormat(EMPHASIS | STRONG),
      ),
      paragraph(popFormat(EMPHASIS), pushFormat(STRONG)),
    );

    expect(render(body, new CallLog())).toEqual([
      "begin",
      "push 1 -> 1",
      "push 2 -> 3",
      "text x",
      "pop 2 -> 1",
      "pop 1 -> 0",
      "end",
      "begin",
      "push 2 -> 2",
      "end",
    ]);
  });

  it("ignores bytes after the message", () => {
    expect(renderText(concat(plainMessage("hi"), Uint8Array.of(0x00, 0x00)))).toBe("hi");
  });

  it("rejects bodies that break the grammar", () => {
    expect(() => renderText(message(text("bare")))).toThrow(ValidationError);
    expect(() => renderText(paragraph(text("loose")))).toThrow("root frame must be Message, got type 1");
  });
});

describe("renderText", () => {
  it("writes paragraphs, links and mentions as plain text", () => {
    const body = message(
      paragraph(
        text("hi "),
        mention(7),
        text(", see "),
        pushFormat(STRONG),
        hyperlink("docs", "https://example.com"),
        popFormat(STRONG),
      ),
      paragraph(hyperlink(null, "https://example.org")),
    );

    expect(renderText(body)).toBe("hi @7, see docs (https://example.com)\n\nhttps://example.org");
  });

  it("spells mentions with the given names", () => {
    const names = new Map([[7, "Ada"]]);
    const body = message(paragraph(text("ping "), mention(7)));

    expect(renderText(body, (user) => names.get(user) ?? "someone")).toBe("ping Ada");
  });
});
