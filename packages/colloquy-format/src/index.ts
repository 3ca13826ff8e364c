// @colloquy/format - message body grammar.

export {
  FrameType,
  FormatFlags,
  KNOWN_FORMAT_BITS,
  ALLOWED_CHILDREN,
  isFrameType,
  frameName,
} from "./frame.ts";
export { ValidationError, type ValidationErrorKind } from "./error.ts";
export { validate, type Validation, type Link } from "./validate.ts";
export { render, renderText, TextRenderer, type Renderer } from "./render.ts";
export {
  frame,
  message,
  paragraph,
  text,
  pushFormat,
  popFormat,
  hyperlink,
  mention,
  plainMessage,
} from "./builder.ts";
