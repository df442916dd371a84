import request from "supertest";
import express from "express";
import { HealthReport } from "../monitoring/health.checker";
import { metrics } from "../monitoring/metrics.collector";
import { AppServices, createAppServices } from "../services";
import { FakeSiteGateway, RecordingMessenger, SUCCESS_RESPONSE, flushPromises } from "../test/fakes";
import { createServer } from "./server";

const DAY = "20/12/2026";
const AUTH = { Authorization: "Bearer test-secret" };

const HEALTHY: HealthReport = {
  status: "healthy",
  uptime: 12,
  checks: {
    site: { status: "up", latency: 3 },
    solver: { configured: false },
    telegram: { enabled: false },
  },
};

const ROW = {
  FullName: "Test Person",
  DOB_Day: 5,
  DOB_Month: 6,
  DOB_Year: 1990,
  Phone: "0900000000",
  Email: "person@example.com",
  IDNumber: "001",
};

describe("Admin API", () => {
  let services: AppServices;
  let health: jest.Mock<Promise<HealthReport>, []>;
  let app: express.Application;

  beforeEach(() => {
    metrics.reset();
    services = createAppServices({
      messenger: new RecordingMessenger(),
      solver: null,
      createGateway: () => new FakeSiteGateway({ days: [{ label: DAY, id: "D20" }] }),
    });
    health = jest.fn<Promise<HealthReport>, []>().mockResolvedValue(HEALTHY);
    app = createServer({ ...services, health, serviceSecret: "test-secret" });
  });

  afterEach(async () => {
    await services.scheduler.drain();
  });

  /** Start a run over the API and wait until its rows await captchas */
  async function startRun(channelId = "api-ops"): Promise<request.Response> {
    const res = await request(app)
      .post("/api/registration/v1/runs")
      .set(AUTH)
      .send({ channelId, rows: [ROW] });
    await services.scheduler.drain();
    await flushPromises();
    return res;
  }

  describe("monitoring", () => {
    it("should report health without authentication", async () => {
      const res = await request(app).get("/api/registration/v1/health");

      expect(res.status).toBe(200);
      expect(res.body).toEqual(HEALTHY);
    });

    it("should answer 503 when the site is down", async () => {
      health.mockResolvedValue({ ...HEALTHY, status: "unhealthy" });

      const res = await request(app).get("/api/registration/v1/health");

      expect(res.status).toBe(503);
    });

    it("should expose metrics as text", async () => {
      metrics.increment("registration_rows_total", { status: "success" });

      const res = await request(app).get("/api/registration/v1/metrics");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toMatch(/^text\/plain/);
      expect(res.text.split("\n").slice(0, 3)).toEqual([
        "# HELP registration_rows_total Registrant rows finished, by status",
        "# TYPE registration_rows_total counter",
        'registration_rows_total{status="success"} 1',
      ]);
    });
  });

  describe("authentication", () => {
    it("should reject a request without a bearer token", async () => {
      const res = await request(app).get("/api/registration/v1/status");

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "Unauthorized" });
    });

    it("should reject a wrong secret", async () => {
      const res = await request(app).get("/api/registration/v1/runs").set({ Authorization: "Bearer nope" });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "Forbidden" });
    });
  });

  describe("runs", () => {
    it("should start a run and return it at once", async () => {
      const res = await startRun();

      expect(res.status).toBe(202);
      expect(res.body).toMatchObject({
        channelId: "api-ops",
        trigger: "roster",
        days: [DAY],
        claimed: [DAY],
        skipped: [],
      });

      const fetched = await request(app).get(`/api/registration/v1/runs/${res.body.id}`).set(AUTH);
      expect(fetched.status).toBe(200);
      expect(fetched.body.results[0]).toMatchObject({ label: DAY, status: "COMPLETED" });

      const list = await request(app).get("/api/registration/v1/runs").set(AUTH);
      expect(list.body.runs).toHaveLength(1);
    });

    it("should skip days a previous run claimed", async () => {
      await startRun();
      const res = await startRun("other-ops");

      expect(res.body).toMatchObject({ claimed: [], skipped: [DAY] });
    });

    it("should validate the request body", async () => {
      const res = await request(app).post("/api/registration/v1/runs").set(AUTH).send({ rows: [ROW] });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Invalid request", details: ['"channelId" is required'] });
    });

    it("should reject invalid roster rows", async () => {
      const res = await request(app)
        .post("/api/registration/v1/runs")
        .set(AUTH)
        .send({ channelId: "api-ops", rows: [{ ...ROW, Email: "nope" }] });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Invalid roster", problems: ['Row 1: "Email" must be a valid email'] });
    });

    it("should answer 404 for an unknown run", async () => {
      const res = await request(app).get("/api/registration/v1/runs/missing").set(AUTH);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Run not found" });
    });
  });

  describe("status", () => {
    it("should show days and pending captchas", async () => {
      await startRun();

      const res = await request(app).get("/api/registration/v1/status").set(AUTH);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        activeTasks: [],
        pendingCaptchas: 1,
        rosterChannels: ["api-ops"],
      });
      expect(res.body.days).toMatchObject([{ label: DAY, id: "D20", state: "COMPLETED" }]);
    });
  });

  describe("captchas", () => {
    const key = { channelId: "api-ops", dayLabel: DAY, rowIndex: 0 };

    it("should list pending captchas", async () => {
      await startRun();

      const res = await request(app).get("/api/registration/v1/captchas").set(AUTH);

      expect(res.body.pending).toHaveLength(1);
      expect(res.body.pending[0]).toMatchObject({ key, dayId: "D20", sessionId: "S1", fullName: "Test Person" });
    });

    it("should serve the captcha image of a row", async () => {
      await startRun();

      const res = await request(app).get("/api/registration/v1/captchas/image").query(key).set(AUTH);

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("image/png");
      expect(res.body).toEqual(Buffer.from("challenge-1"));
    });

    it("should validate the image query", async () => {
      const res = await request(app)
        .get("/api/registration/v1/captchas/image")
        .query({ channelId: "api-ops", rowIndex: 0 })
        .set(AUTH);

      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(['"dayLabel" is required']);
    });

    it("should answer 404 for an image nobody is waiting on", async () => {
      const res = await request(app).get("/api/registration/v1/captchas/image").query(key).set(AUTH);

      expect(res.status).toBe(404);
    });

    it("should submit an answer for a row once", async () => {
      await startRun();

      const res = await request(app)
        .post("/api/registration/v1/captchas/answer")
        .set(AUTH)
        .send({ ...key, answer: "x7k2" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ key, outcome: "SUCCESS", response: SUCCESS_RESPONSE });

      const again = await request(app)
        .post("/api/registration/v1/captchas/answer")
        .set(AUTH)
        .send({ ...key, answer: "x7k2" });
      expect(again.status).toBe(404);
    });

    it("should answer the oldest captcha of a channel without a row", async () => {
      await startRun();

      const res = await request(app)
        .post("/api/registration/v1/captchas/answer")
        .set(AUTH)
        .send({ channelId: "api-ops", answer: "x7k2" });

      expect(res.status).toBe(200);
      expect(res.body.key).toEqual(key);
      expect(services.pendingStore.size()).toBe(0);
    });

    it("should require the day and the row together", async () => {
      const res = await request(app)
        .post("/api/registration/v1/captchas/answer")
        .set(AUTH)
        .send({ channelId: "api-ops", answer: "x7k2", dayLabel: DAY });

      expect(res.status).toBe(400);
    });
  });
});
