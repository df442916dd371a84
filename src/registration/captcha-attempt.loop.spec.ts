import { metrics } from "../monitoring/metrics.collector";
import { InvalidRowError, SiteUnreachableError } from "../shared/errors/registration.errors";
import { TwoCaptchaApiError } from "../shared/errors/captcha.errors";
import {
  CAPTCHA_RESPONSE,
  FULL_RESPONSE,
  FakeSiteGateway,
  FakeSolver,
  RecordingMessenger,
  SUCCESS_RESPONSE,
  makeRow,
} from "../test/fakes";
import { CaptchaAttemptLoop, CaptchaAttemptLoopDeps, RowContext } from "./captcha-attempt.loop";
import { PendingCaptchaStore } from "./pending-captcha.store";

const DAY = "20/12/2026";

function context(overrides: Partial<RowContext> = {}): RowContext {
  return {
    channelId: "chat-1",
    dayLabel: DAY,
    dayId: "D20",
    session: { id: "S1", label: "09:00 - 11:00" },
    row: makeRow(0),
    ...overrides,
  };
}

describe("CaptchaAttemptLoop", () => {
  let gateway: FakeSiteGateway;
  let manualGateways: FakeSiteGateway[];
  let messenger: RecordingMessenger;
  let store: PendingCaptchaStore;

  function loop(overrides: Partial<CaptchaAttemptLoopDeps>): CaptchaAttemptLoop {
    return new CaptchaAttemptLoop({
      gateway,
      createGateway: () => {
        const fresh = new FakeSiteGateway();
        manualGateways.push(fresh);
        return fresh;
      },
      solver: new FakeSolver(),
      messenger,
      pendingStore: store,
      maxAttempts: 4,
      ...overrides,
    });
  }

  beforeEach(() => {
    gateway = new FakeSiteGateway();
    manualGateways = [];
    messenger = new RecordingMessenger();
    store = new PendingCaptchaStore();
    metrics.reset();
  });

  describe("automatic mode", () => {
    it("should register on the first attempt when the site accepts the answer", async () => {
      gateway = new FakeSiteGateway({ responses: [SUCCESS_RESPONSE] });

      const result = await loop({}).run(context());

      expect(result).toEqual({ dayLabel: DAY, rowIndex: 0, status: "SUCCESS", attempts: 1, message: undefined });
      expect(gateway.submissions).toHaveLength(1);
      expect(gateway.submissions[0]).toMatchObject({
        idNgayBanHang: "D20",
        idPhien: "S1",
        Captcha: "abc12",
        NgaySinh_Ngay: "5",
      });
      expect(messenger.textsFor("chat-1")).toEqual([`✅ [${DAY}] Row 1 — registered (attempt 1/4).`]);
      expect(store.size()).toBe(0);
    });

    it("should fetch a fresh challenge per attempt and fail once after four rejections", async () => {
      gateway = new FakeSiteGateway({
        responses: [CAPTCHA_RESPONSE, CAPTCHA_RESPONSE, CAPTCHA_RESPONSE, CAPTCHA_RESPONSE],
      });
      const solver = new FakeSolver();

      const result = await loop({ solver }).run(context());

      expect(result.status).toBe("FAILED");
      expect(result.attempts).toBe(4);
      expect(gateway.captchaRequests).toBe(4);
      expect(gateway.downloads).toEqual(["challenge-1", "challenge-2", "challenge-3", "challenge-4"]);
      expect(solver.images).toHaveLength(4);
      expect(gateway.submissions).toHaveLength(4);
      expect(messenger.textsFor("chat-1")).toEqual([
        `⏭️ [${DAY}] Row 1 — skipped after 4 attempts. Captcha rejected by the site (attempt 4/4).`,
      ]);
      expect(metrics.get("captcha_attempts_total", { result: "captcha_rejected" })).toBe(4);
      expect(metrics.get("registration_rows_total", { status: "failed" })).toBe(1);
    });

    it("should fail after four attempts when the solver never answers", async () => {
      const solver = new FakeSolver([null, null, null, null]);

      const result = await loop({ solver }).run(context());

      expect(result.status).toBe("FAILED");
      expect(result.attempts).toBe(4);
      expect(gateway.captchaRequests).toBe(4);
      expect(gateway.downloads).toEqual(["challenge-1", "challenge-2", "challenge-3", "challenge-4"]);
      expect(solver.images).toHaveLength(4);
      expect(gateway.submissions).toEqual([]);
      expect(messenger.textsFor("chat-1")).toEqual([
        `⏭️ [${DAY}] Row 1 — skipped after 4 attempts. fake-solver gave no answer (attempt 4/4).`,
      ]);
      expect(metrics.get("captcha_attempts_total", { result: "no_answer" })).toBe(4);
    });

    it("should never run more attempts than configured", async () => {
      gateway = new FakeSiteGateway({ responses: Array.from({ length: 10 }, () => CAPTCHA_RESPONSE) });

      const result = await loop({ maxAttempts: 2 }).run(context());

      expect(result.attempts).toBe(2);
      expect(gateway.submissions).toHaveLength(2);
    });

    it("should count a missing solver answer as an attempt without submitting", async () => {
      gateway = new FakeSiteGateway({ responses: [SUCCESS_RESPONSE] });
      const solver = new FakeSolver([null, "x7k2"]);

      const result = await loop({ solver }).run(context());

      expect(result.status).toBe("SUCCESS");
      expect(result.attempts).toBe(2);
      expect(gateway.submissions).toHaveLength(1);
      expect(gateway.submissions[0].Captcha).toBe("x7k2");
    });

    it("should count solver and gateway errors as attempts", async () => {
      gateway = new FakeSiteGateway({
        responses: [new SiteUnreachableError("submitRegistration", "socket hang up"), SUCCESS_RESPONSE],
      });
      const solver = new FakeSolver([new TwoCaptchaApiError("timeout of 30000ms exceeded"), "a1", "b2"]);

      const result = await loop({ solver }).run(context());

      expect(result.status).toBe("SUCCESS");
      expect(result.attempts).toBe(3);
      expect(metrics.get("captcha_attempts_total", { result: "error" })).toBe(2);
    });

    it("should stop without retrying when the site refuses for another reason", async () => {
      gateway = new FakeSiteGateway({ responses: ["Số điện thoại không hợp lệ", SUCCESS_RESPONSE] });

      const result = await loop({}).run(context());

      expect(result).toEqual({
        dayLabel: DAY,
        rowIndex: 0,
        status: "OTHER_FAILURE",
        attempts: 1,
        message: "Not registered: Số điện thoại không hợp lệ",
      });
      expect(gateway.submissions).toHaveLength(1);
      expect(messenger.textsFor("chat-1")).toEqual([
        `⚠️ [${DAY}] Row 1 — Not registered: Số điện thoại không hợp lệ`,
      ]);
    });

    it("should report a full session to the caller without messaging", async () => {
      gateway = new FakeSiteGateway({ responses: [FULL_RESPONSE] });

      const result = await loop({}).run(context());

      expect(result.status).toBe("SESSION_FULL");
      expect(result.message).toBe(FULL_RESPONSE);
      expect(messenger.texts).toEqual([]);
    });

    it("should fail the row when the site returns no challenge", async () => {
      gateway = new FakeSiteGateway({ captchaRefs: [null] });
      const solver = new FakeSolver();

      const result = await loop({ solver }).run(context());

      expect(result).toEqual({
        dayLabel: DAY,
        rowIndex: 0,
        status: "FAILED",
        attempts: 1,
        message: "Captcha challenge unavailable.",
      });
      expect(solver.images).toEqual([]);
      expect(gateway.submissions).toEqual([]);
      expect(messenger.texts).toEqual([
        { channelId: "chat-1", text: `❌ [${DAY}] Row 1 — captcha challenge unavailable.` },
      ]);
    });

    it("should rethrow a row the site can never accept", async () => {
      const row = makeRow(3, { DOB_Day: "abc" });

      await expect(loop({}).run(context({ row }))).rejects.toBeInstanceOf(InvalidRowError);
      expect(gateway.captchaRequests).toBe(1);
    });

    it("should hand an exhausted row to the operator when fallback is enabled", async () => {
      gateway = new FakeSiteGateway({ responses: [CAPTCHA_RESPONSE, CAPTCHA_RESPONSE] });

      const result = await loop({ maxAttempts: 2, manualFallbackOnExhaustion: true }).run(context());

      expect(result.status).toBe("AWAITING_MANUAL");
      expect(result.attempts).toBe(2);
      expect(store.size()).toBe(1);
      expect(messenger.images).toHaveLength(1);
      expect(messenger.texts).toEqual([]);
    });
  });

  describe("manual mode", () => {
    it("should publish one challenge from a dedicated session and wait for the operator", async () => {
      const result = await loop({ solver: null }).run(context({ row: makeRow(2) }));

      expect(result).toEqual({
        dayLabel: DAY,
        rowIndex: 2,
        status: "AWAITING_MANUAL",
        attempts: 0,
        message: "Waiting for operator captcha.",
      });
      expect(gateway.captchaRequests).toBe(0);
      expect(manualGateways).toHaveLength(1);
      expect(manualGateways[0].captchaRequests).toBe(1);
      expect(messenger.images).toEqual([
        {
          channelId: "chat-1",
          image: Buffer.from("challenge-1"),
          caption: `[${DAY}] Row 3: reply to this message with the captcha code.`,
          messageId: "100",
        },
      ]);

      const task = store.get({ channelId: "chat-1", dayLabel: DAY, rowIndex: 2 });
      expect(task?.messageId).toBe("100");
      expect(task?.gateway).toBe(manualGateways[0]);
      expect(task?.sessionId).toBe("S1");
    });

    it("should use the operator when the solver is not available", async () => {
      const solver = new FakeSolver([], false);

      const result = await loop({ solver }).run(context());

      expect(result.status).toBe("AWAITING_MANUAL");
      expect(solver.images).toEqual([]);
    });
  });
});
