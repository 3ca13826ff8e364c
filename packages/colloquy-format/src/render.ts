// Rendering message bodies.
//
// `render` walks a body frame by frame and hands its content to a Renderer.
// Format frames are reduced to changes: pushing a format that is already
// active, or popping one that is not, never reaches the renderer.

import { FormatFlags, FrameType } from "./frame.ts";
import {
  eachChild,
  readFormat,
  readHyperlink,
  readMention,
  readRoot,
  readText,
} from "./validate.ts";

/** Receives the content of a message, in order. */
export interface Renderer<R> {
  beginParagraph(): void;
  endParagraph(): void;
  text(text: string): void;
  /**
   * Apply `format` to the text that follows.
   *
   * `current` is the cumulative format after applying it.
   */
  pushFormat(format: number, current: number): void;
  /**
   * Stop applying `format`.
   *
   * `current` is the cumulative format after removing it.
   */
  popFormat(format: number, current: number): void;
  hyperlink(label: string | null, url: string): void;
  mention(user: number): void;
  /** Produce the rendered result. */
  finish(): R;
}

/**
 * Render a message body.
 *
 * Bytes after the root frame are ignored.
 *
 * @throws ValidationError when the body breaks the grammar
 */
export function render<R>(body: Uint8Array, renderer: Renderer<R>): R {
  const { root } = readRoot(body);

  eachChild(FrameType.Message, root, (_type, paragraph) => {
    renderer.beginParagraph();
    let format: number = FormatFlags.NONE;

    eachChild(FrameType.Paragraph, paragraph, (type, frame) => {
      switch (type) {
        case FrameType.Text:
          renderer.text(readText(frame));
          break;
        case FrameType.PushFormat: {
          const added = readFormat(frame) & ~format;
          if (added !== FormatFlags.NONE) {
            format |= added;
            renderer.pushFormat(added, format);
          }
          break;
        }
        case FrameType.PopFormat: {
          const removed = readFormat(frame) & format;
          if (removed !== FormatFlags.NONE) {
            format &= ~removed;
            renderer.popFormat(removed, format);
          }
          break;
        }
        case FrameType.Hyperlink: {
          const { label, url } = readHyperlink(frame);
          renderer.hyperlink(label, url);
          break;
        }
        case FrameType.Mention:
          renderer.mention(readMention(frame));
          break;
      }
    });

    renderer.endParagraph();
  });

  return renderer.finish();
}

/**
 * Renders a message as plain text.
 *
 * Paragraphs are separated by a blank line, links read `label (url)` and
 * mentions are spelled by `mentionName`, `@<id>` by default.
 */
export class TextRenderer implements Renderer<string> {
  private paragraphs: string[] = [];
  private current = "";

  constructor(private readonly mentionName: (user: number) => string = (user) => `@${user}`) {}

  beginParagraph(): void {
    this.current = "";
  }

  endParagraph(): void {
    this.paragraphs.push(this.current);
  }

  text(text: string): void {
    this.current += text;
  }

  pushFormat(): void {}

  popFormat(): void {}

  hyperlink(label: string | null, url: string): void {
    this.current += label === null ? url : `${label} (${url})`;
  }

  mention(user: number): void {
    this.current += this.mentionName(user);
  }

  finish(): string {
    return this.paragraphs.join("\n\n");
  }
}

/** Plain-text rendering of a message body. */
export function renderText(body: Uint8Array, mentionName?: (user: number) => string): string {
  return render(body, new TextRenderer(mentionName));
}
