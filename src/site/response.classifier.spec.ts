import { classifySubmissionResponse, createResponseClassifier } from "./response.classifier";

describe("classifySubmissionResponse", () => {
  it("should recognise a successful registration", () => {
    expect(classifySubmissionResponse("!!!True|~~|Đăng ký thành công")).toBe("SUCCESS");
  });

  it("should recognise a full session in Vietnamese and English", () => {
    expect(classifySubmissionResponse("Phiên này đã HẾT CHỖ")).toBe("SESSION_FULL");
    expect(classifySubmissionResponse("Phien nay het suat")).toBe("SESSION_FULL");
    expect(classifySubmissionResponse("This session is full")).toBe("SESSION_FULL");
  });

  it("should recognise a rejected captcha regardless of case", () => {
    expect(classifySubmissionResponse("Mã CAPTCHA không đúng")).toBe("CAPTCHA_REJECTED");
  });

  it("should put a full session ahead of a captcha complaint", () => {
    expect(classifySubmissionResponse("Captcha hợp lệ nhưng phiên đã hết chỗ")).toBe("SESSION_FULL");
  });

  it("should treat anything else as another failure", () => {
    expect(classifySubmissionResponse("")).toBe("OTHER_FAILURE");
    expect(classifySubmissionResponse("Số CCCD đã được đăng ký")).toBe("OTHER_FAILURE");
  });

  it("should match decomposed Vietnamese text", () => {
    expect(classifySubmissionResponse("hết chỗ".normalize("NFD"))).toBe("SESSION_FULL");
  });
});

describe("createResponseClassifier", () => {
  it("should use the markers it is given", () => {
    const classify = createResponseClassifier({ success: "OK:", sessionFull: ["no seats"], captcha: "code" });

    expect(classify("OK: done")).toBe("SUCCESS");
    expect(classify("No Seats left")).toBe("SESSION_FULL");
    expect(classify("bad code")).toBe("CAPTCHA_REJECTED");
    expect(classify("!!!True|~~|")).toBe("OTHER_FAILURE");
  });
});
