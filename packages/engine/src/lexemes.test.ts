import { describe, test, expect } from "vitest";
import { Cursor } from "./cursor.js";
import {
  parseIdentifier,
  parseMetaComment,
  parseMetaKeyValue,
  parseQuotedString,
  parseUntilEol,
  parseVariable,
} from "./lexemes.js";

describe("parseIdentifier", () => {
  test("reads letters, digits and underscores", () => {
    const result = parseIdentifier(Cursor.from("my_var2 rest"));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe("my_var2");
    expect(result.rest.fragment).toBe(" rest");
  });

  test("rejects a leading digit or underscore", () => {
    expect(parseIdentifier(Cursor.from("1abc")).ok).toBe(false);
    expect(parseIdentifier(Cursor.from("_abc")).ok).toBe(false);
  });
});

describe("parseVariable", () => {
  test("strips the sigil", () => {
    const result = parseVariable(Cursor.from("£title }}"));
    expect(result.ok && result.value).toBe("title");
  });

  test("rejects names that do not start with a letter", () => {
    expect(parseVariable(Cursor.from("£1_to_2")).ok).toBe(false);
    expect(parseVariable(Cursor.from("£_author")).ok).toBe(false);
  });

  test("requires the sigil", () => {
    const result = parseVariable(Cursor.from("title"));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.position).toEqual({ line: 1, offset: 0 });
  });
});

describe("parseUntilEol", () => {
  test("consumes the newline but does not return it", () => {
    const result = parseUntilEol(Cursor.from("hello\nworld"));
    expect(result.value).toBe("hello");
    expect(result.rest.fragment).toBe("world");
    expect(result.rest.line).toBe(2);
  });

  test("drops a carriage return", () => {
    expect(parseUntilEol(Cursor.from("abc\r\nx")).value).toBe("abc");
  });

  test("end of input ends the line", () => {
    const result = parseUntilEol(Cursor.from("last"));
    expect(result.value).toBe("last");
    expect(result.rest.atEnd).toBe(true);
  });
});

describe("parseMetaComment", () => {
  test("returns the text after //", () => {
    const result = parseMetaComment(Cursor.from("// This is a comment"));
    expect(result.ok && result.value).toBe("This is a comment");
  });

  test("accepts # and consumes the line", () => {
    const result = parseMetaComment(Cursor.from("  # hash comment\nnext"));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe("hash comment");
    expect(result.rest.fragment).toBe("next");
  });

  test("does not match a key/value line", () => {
    expect(parseMetaComment(Cursor.from("title = x")).ok).toBe(false);
  });
});

describe("parseQuotedString", () => {
  test("keeps escaped quotes verbatim", () => {
    const result = parseQuotedString(Cursor.from('"I said \\"John Doe\\""'));
    expect(result.ok && result.value).toBe('I said \\"John Doe\\"');
  });

  test("may span lines", () => {
    const result = parseQuotedString(Cursor.from('"line one\nline two" tail'));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe("line one\nline two");
    expect(result.rest.fragment).toBe(" tail");
    expect(result.rest.line).toBe(2);
  });

  test("fails when unterminated", () => {
    const result = parseQuotedString(Cursor.from('"abc'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Unterminated quoted string");
  });
});

describe("parseMetaKeyValue", () => {
  test("parses a bare value", () => {
    const result = parseMetaKeyValue(Cursor.from("title = Meta title  \nnext"));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({ key: "title", value: "Meta title" });
    expect(result.rest.fragment).toBe("next");
  });

  test("strips a sigil from the key", () => {
    const result = parseMetaKeyValue(Cursor.from("£author = John Doe"));
    expect(result.ok && result.value).toEqual({ key: "author", value: "John Doe" });
  });

  test("parses a quoted value with a newline", () => {
    const result = parseMetaKeyValue(Cursor.from('summary = "first\nsecond"\n'));
    expect(result.ok && result.value).toEqual({ key: "summary", value: "first\nsecond" });
  });

  test("parses a quoted value without spaces around =", () => {
    const result = parseMetaKeyValue(Cursor.from('key="value"'));
    expect(result.ok && result.value).toEqual({ key: "key", value: "value" });
  });

  test("rejects text after a quoted value", () => {
    expect(parseMetaKeyValue(Cursor.from('key = "value" trailing')).ok).toBe(false);
  });

  test("requires =", () => {
    const result = parseMetaKeyValue(Cursor.from("key value"));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Expected "=" after "key"');
    expect(result.error.position.offset).toBe(4);
  });
});
