import express from "express";
import { afterEach, describe, expect, it } from "vitest";
import { SerializationError } from "./errors";
import { sendJson, sendJsonOrError } from "./http";
import { capturingLogger, startServer, type TestServer } from "./testing";

describe("http helpers", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("sends JSON with the given status", async () => {
    const app = express();
    app.get("/", (_req, res) => sendJson(res, { visits: 3 }, 201));
    server = await startServer(app);

    const res = await server.request("GET", "/");

    expect(res.status).toBe(201);
    expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
    expect(res.text).toBe('{"visits":3}');
  });

  it("throws before writing when the body cannot be encoded", async () => {
    let thrown: unknown;
    const app = express();
    app.get("/", (_req, res) => {
      try {
        sendJson(res, { visits: 3n });
      } catch (err) {
        thrown = err;
      }
      res.end();
    });
    server = await startServer(app);

    const res = await server.request("GET", "/");

    expect(thrown).toBeInstanceOf(SerializationError);
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBeUndefined();
  });

  it("answers 500 and logs when a response cannot be encoded", async () => {
    const { logger, logs } = capturingLogger();
    const app = express();
    app.get("/", (_req, res) => sendJsonOrError(res, { visits: 3n }, logger));
    server = await startServer(app);

    const res = await server.request("GET", "/");

    expect(res.status).toBe(500);
    expect(res.text).toBe('{"error":"Failed to encode response"}');
    expect(logs.withMessage("Error encoding response")).toMatchObject([{ level: 50 }]);
  });

  it("treats values without a JSON form as unencodable", async () => {
    let thrown: unknown;
    const app = express();
    app.get("/", (_req, res) => {
      try {
        sendJson(res, undefined);
      } catch (err) {
        thrown = err;
      }
      res.end();
    });
    server = await startServer(app);

    await server.request("GET", "/");

    expect(thrown).toBeInstanceOf(SerializationError);
    expect(thrown).toMatchObject({
      message: "failed to encode response: value has no JSON representation",
    });
  });
});
