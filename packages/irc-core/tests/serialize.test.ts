import { describe, expect, it } from "vitest";
import { SerializeError } from "../src/errors";
import { parseIrcMessage } from "../src/protocol/ircParser";
import { createIrcMessage, ircMessagesEqual } from "../src/protocol/message";
import { serializeIrcMessage } from "../src/protocol/serialize";
import type { IrcMessage, IrcMessageInit } from "../src/types";

const serializeErrorCode = (init: IrcMessageInit) => {
  try {
    serializeIrcMessage(createIrcMessage(init));
  } catch (error) {
    if (error instanceof SerializeError) return error.code;
    throw error;
  }
  return null;
};

describe("serializeIrcMessage", () => {
  it("writes a spaced last parameter as trailing", () => {
    expect(serializeIrcMessage(createIrcMessage({ command: "CMD", params: ["a", "b c"] }))).toBe("CMD a :b c");
  });

  it("writes every segment in wire order", () => {
    const message = createIrcMessage({
      tags: [
        ["id", "234AB"],
        ["tag2", "a b"],
        ["+typing", undefined],
        ["empty", ""]
      ],
      source: { nick: "dan", user: "d", host: "localhost" },
      command: "PRIVMSG",
      params: ["#chan", "Hello"]
    });
    expect(serializeIrcMessage(message)).toBe(
      "@id=234AB;tag2=a\\sb;+typing;empty= :dan!d@localhost PRIVMSG #chan Hello"
    );
  });

  it("escapes tag values", () => {
    const message = createIrcMessage({ tags: [["k", "a;b c\\d\r\n"]], command: "TAGMSG" });
    expect(serializeIrcMessage(message)).toBe("@k=a\\:b\\sc\\\\d\\r\\n TAGMSG");
  });

  it("writes partial sources", () => {
    expect(serializeIrcMessage(createIrcMessage({ source: { nick: "irc.example.com" }, command: "001", params: ["me", "Welcome"] }))).toBe(
      ":irc.example.com 001 me Welcome"
    );
    expect(serializeIrcMessage(createIrcMessage({ source: { nick: "n", host: "h" }, command: "JOIN", params: ["#a"] }))).toBe(
      ":n@h JOIN #a"
    );
  });

  it("marks an empty or colon-led last parameter as trailing", () => {
    expect(serializeIrcMessage(createIrcMessage({ command: "PRIVMSG", params: ["#channel", ":Message thing"] }))).toBe(
      "PRIVMSG #channel ::Message thing"
    );
    expect(serializeIrcMessage(createIrcMessage({ command: "PRIVMSG", params: [""] }))).toBe("PRIVMSG :");
    expect(serializeIrcMessage(createIrcMessage({ command: "QUIT" }))).toBe("QUIT");
  });

  it("rejects parameters that cannot stay in the middle", () => {
    expect(serializeErrorCode({ command: "CMD", params: ["a b", "x"] })).toBe("InvalidParameter");
    expect(serializeErrorCode({ command: "CMD", params: ["", "x"] })).toBe("InvalidParameter");
    expect(serializeErrorCode({ command: "CMD", params: [":a", "x"] })).toBe("InvalidParameter");
  });

  it("rejects line breaks anywhere in the parameters", () => {
    expect(serializeErrorCode({ command: "PRIVMSG", params: ["#a", "hi\r\nQUIT"] })).toBe("InvalidParameter");
    expect(serializeErrorCode({ command: "PRIVMSG", params: ["#a", "nul\0"] })).toBe("InvalidParameter");
  });

  it("rejects more than fourteen parameters", () => {
    const params = Array.from({ length: 15 }, (_, index) => String(index));
    expect(serializeErrorCode({ command: "CMD", params })).toBe("TooManyParameters");
  });

  it("rejects invalid commands", () => {
    expect(serializeErrorCode({ command: "" })).toBe("InvalidCommand");
    expect(serializeErrorCode({ command: "PRIV MSG" })).toBe("InvalidCommand");
    expect(serializeErrorCode({ command: "01" })).toBe("InvalidCommand");
  });

  it("rejects invalid tag keys", () => {
    expect(serializeErrorCode({ command: "TAGMSG", tags: [["bad key", "1"]] })).toBe("InvalidTagKey");
  });

  it("rejects sources that would split differently", () => {
    expect(serializeErrorCode({ command: "CMD", source: { nick: "a b" } })).toBe("InvalidSource");
    expect(serializeErrorCode({ command: "CMD", source: { nick: "a!b" } })).toBe("InvalidSource");
    expect(serializeErrorCode({ command: "CMD", source: { nick: "a", user: "u@x", host: "h" } })).toBe("InvalidSource");
    expect(serializeErrorCode({ command: "CMD", source: { nick: "a", host: "h!x" } })).toBe("InvalidSource");
  });
});

describe("round trip", () => {
  const fourteen = [...Array.from({ length: 13 }, (_, index) => `p${index}`), "last one"];

  const messages: IrcMessage[] = [
    createIrcMessage({ command: "PING", params: ["irc.example.net"] }),
    createIrcMessage({
      tags: [
        ["msgid", "abc"],
        ["+draft/reply", "x;y z\\"],
        ["+typing", undefined],
        ["time", ""],
        ["literal", "\\s"]
      ],
      source: { nick: "nick", user: "user", host: "host.example.com" },
      command: "PRIVMSG",
      params: ["#chan", "hello there"]
    }),
    createIrcMessage({ source: { nick: "" }, command: "NOTICE", params: ["*", ""] }),
    createIrcMessage({ command: "005", params: fourteen }),
    createIrcMessage({ command: "privmsg", params: ["#a", "::double"] })
  ];

  const cases = messages.map((message): [string, IrcMessage] => [message.command, message]);

  it.each(cases)("%s survives serialize and parse", (_, message) => {
    expect(ircMessagesEqual(parseIrcMessage(serializeIrcMessage(message)), message)).toBe(true);
  });

  it("reproduces a canonical line", () => {
    const line = "@a=b;c :n!u@h PRIVMSG #x :hi there";
    expect(serializeIrcMessage(parseIrcMessage(line))).toBe(line);
  });
});
