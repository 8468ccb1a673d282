import { describe, it, expect } from "vitest";
import { silentLogger } from "@/notebook/core/config";
import { ProtocolProxy, sharedProxy } from "@/protocol/proxy";
import { SessionRegistry } from "@/protocol/registry";
import { FakeBackend, HUMAN_URI, createSession } from "../_helpers/session";

const OTHER_URI = "file:///work/other.ipynb";
const range = { start: { line: 8, character: 0 }, end: { line: 8, character: 5 } };

const setup = () => {
  const proxy = new ProtocolProxy({ logger: silentLogger });
  const nbA = createSession();
  const nbB = createSession({ uri: OTHER_URI });
  const backendA = new FakeBackend(() => null);
  const backendB = new FakeBackend(() => [{ uri: `${OTHER_URI}.shadow.py`, range }]);
  const a = proxy.attach(nbA, { backend: backendA });
  const b = proxy.attach(nbB, { backend: backendB });
  return { proxy, nbA, nbB, backendA, backendB, a, b };
};

describe("SessionRegistry", () => {
  it("asks each session whether it owns a uri", () => {
    const registry = new SessionRegistry();
    const owner = { owns: (uri: string) => uri.startsWith("file:///a") };
    const off = registry.register(owner);
    expect(registry.resolve("file:///a.shadow.py")).toBe(owner);
    expect(registry.resolve("file:///b")).toBeUndefined();
    off();
    expect(registry.size).toBe(0);
    expect(registry.unregister(owner)).toBe(false);
  });
});

describe("ProtocolProxy", () => {
  it("routes every view identity to the document that owns it", () => {
    const { proxy, nbA, a, b } = setup();
    expect(proxy.registry.size).toBe(2);
    expect(proxy.sessionFor(HUMAN_URI)).toBe(a);
    expect(proxy.sessionFor(`${HUMAN_URI}.shadow.py`)).toBe(a);
    expect(proxy.sessionFor(`nb:${OTHER_URI}`)).toBe(b);
    expect(proxy.sessionFor("file:///work/script.py")).toBeUndefined();

    nbA.openOverlay("c2");
    expect(proxy.sessionFor(`${HUMAN_URI}.cell-c2.py`)).toBe(a);
  });

  it("forwards requests to the owning document's backend", async () => {
    const { proxy, backendA, backendB } = setup();
    const result = await proxy.request(OTHER_URI, "textDocument/definition", {
      textDocument: { uri: OTHER_URI },
      position: { line: 8, character: 2 },
    });
    expect(result).toEqual([{ uri: OTHER_URI, range }]);
    expect(backendB.requests).toHaveLength(1);
    expect(backendA.requests).toHaveLength(0);
  });

  it("answers calls for unknown uris with empty results", async () => {
    const { proxy } = setup();
    expect(await proxy.request("file:///x.py", "textDocument/hover", {})).toBeUndefined();
    expect(await proxy.rename("file:///x.py", { line: 0, character: 0 }, "v")).toBeUndefined();
    expect(await proxy.formatCell("file:///x.py", "c1")).toBe(false);
    expect(await proxy.formatAll("file:///x.py")).toBe(0);
    expect(proxy.showDocument({ uri: "file:///x.py" })).toBe(false);
    expect(proxy.setCursor("file:///x.py", { line: 0, character: 0 })).toBe(false);
    expect(proxy.openVirtualDocument("nb:file:///x.ipynb")).toBeUndefined();
    expect(proxy.releasePreviews("file:///x.ipynb")).toBe(0);
  });

  it("re-attaching a document replaces its session", () => {
    const { proxy, nbA, backendA, a } = setup();
    const again = proxy.attach(nbA, { backend: new FakeBackend() });
    expect(again).not.toBe(a);
    expect(proxy.sessionFor(HUMAN_URI)).toBe(again);
    expect(proxy.registry.size).toBe(2);
    expect(backendA.methods()).toEqual(["textDocument/didOpen", "textDocument/didClose"]);
  });

  it("detaching closes the document on its backend", () => {
    const { proxy, backendB } = setup();
    expect(proxy.detach(OTHER_URI)).toBe(true);
    expect(proxy.detach(OTHER_URI)).toBe(false);
    expect(proxy.registry.size).toBe(1);
    expect(backendB.methods()).toEqual(["textDocument/didOpen", "textDocument/didClose"]);
  });

  it("previews are handed out and released per document", () => {
    const { proxy, nbA } = setup();
    expect(proxy.openVirtualDocument(`nb:${HUMAN_URI}`)).toEqual(nbA.human.getLines());
    expect(proxy.releasePreviews(HUMAN_URI)).toBe(1);
  });

  it("exposes one shared instance", () => {
    expect(sharedProxy).toBeInstanceOf(ProtocolProxy);
  });
});
