import { describe, test, expect, vi, afterEach } from "vitest";
import { NllbServerBackend } from "../../src/services/engines/nllb";
import { LibreTranslateBackend } from "../../src/services/engines/argos";
import { BackendInferenceError } from "../../src/utils/errors";

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    respond()
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const init = fetchMock.mock.calls[0]?.[1];
  return JSON.parse(String(init?.body));
}

describe("HTTP translation backends", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("NllbServerBackend", () => {
    const backend = new NllbServerBackend({ url: "http://nllb.test/", timeoutMs: 1000 });

    test("should post a batch and return the translations", async () => {
      const fetchMock = stubFetch(() => jsonResponse({ translation: ["Hi", "Bye"] }));

      const texts = await backend.translateBatch(["Привет", "Пока"], "rus_Cyrl", "eng_Latn");

      expect(texts).toEqual(["Hi", "Bye"]);
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://nllb.test/translate");
      expect(sentBody(fetchMock)).toEqual({
        source: ["Привет", "Пока"],
        src_lang: "rus_Cyrl",
        tgt_lang: "eng_Latn",
      });
    });

    test("should translate a single text through the batch endpoint", async () => {
      stubFetch(() => jsonResponse({ translation: ["Hi"] }));
      await expect(backend.translate("Привет", "rus_Cyrl", "eng_Latn")).resolves.toBe("Hi");
    });

    test("should flag overload statuses as resource errors", async () => {
      stubFetch(() => new Response("busy", { status: 503 }));

      const error = await backend
        .translateBatch(["Привет"], "rus_Cyrl", "eng_Latn")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendInferenceError);
      expect(error).toMatchObject({
        resource: true,
        message: "http://nllb.test/translate responded 503: busy",
      });
    });

    test("should report other statuses as plain failures", async () => {
      stubFetch(() => new Response("bad request", { status: 400 }));

      await expect(
        backend.translateBatch(["Привет"], "rus_Cyrl", "eng_Latn")
      ).rejects.toMatchObject({ resource: false });
    });

    test("should reject malformed replies", async () => {
      stubFetch(() => new Response("not json", { status: 200 }));
      await expect(
        backend.translateBatch(["Привет"], "rus_Cyrl", "eng_Latn")
      ).rejects.toThrow("Malformed response from http://nllb.test/translate");

      stubFetch(() => jsonResponse({ result: [] }));
      await expect(
        backend.translateBatch(["Привет"], "rus_Cyrl", "eng_Latn")
      ).rejects.toThrow("nllb-serve reply has no translation list");
    });

    test("should wrap network errors", async () => {
      stubFetch(() => Promise.reject(new TypeError("fetch failed")));
      await expect(
        backend.translateBatch(["Привет"], "rus_Cyrl", "eng_Latn")
      ).rejects.toThrow("Request to http://nllb.test/translate failed: fetch failed");
    });

    test("should probe the server for availability", async () => {
      stubFetch(() => new Response("ok", { status: 200 }));
      await expect(backend.isAvailable()).resolves.toBe(true);

      stubFetch(() => Promise.reject(new TypeError("fetch failed")));
      await expect(backend.isAvailable()).resolves.toBe(false);
    });
  });

  describe("LibreTranslateBackend", () => {
    test("should send the API key and accept list replies", async () => {
      const backend = new LibreTranslateBackend({
        url: "http://libre.test",
        apiKey: "test-secret",
      });
      const fetchMock = stubFetch(() => jsonResponse({ translatedText: ["Hi", "Bye"] }));

      const texts = await backend.translateBatch(["Привет", "Пока"], "ru", "en");

      expect(texts).toEqual(["Hi", "Bye"]);
      expect(sentBody(fetchMock)).toEqual({
        q: ["Привет", "Пока"],
        source: "ru",
        target: "en",
        format: "text",
        api_key: "test-secret",
      });
    });

    test("should omit the API key when none is set and wrap string replies", async () => {
      const backend = new LibreTranslateBackend({ url: "http://libre.test" });
      const fetchMock = stubFetch(() => jsonResponse({ translatedText: "Hi" }));

      await expect(backend.translate("Привет", "ru", "en")).resolves.toBe("Hi");
      expect(sentBody(fetchMock)).not.toHaveProperty("api_key");
    });

    test("should probe the languages endpoint", async () => {
      const backend = new LibreTranslateBackend({ url: "http://libre.test/" });
      const fetchMock = stubFetch(() => jsonResponse([]));

      await expect(backend.isAvailable()).resolves.toBe(true);
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://libre.test/languages");
    });
  });
});
