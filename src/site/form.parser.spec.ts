import {
  extractSalesDayLabels,
  mapLabelToId,
  parseCaptchaImageRef,
  parseSessionOptions,
} from "./form.parser";

const FORM_HTML = `
<form>
  <select id="slNgayBanHang">
    <option value="">-- Chọn ngày --</option>
    <option value="101"> 20/12/2026 </option>
    <option value="102">21/12/2026</option>
    <option value="">22/12/2026</option>
  </select>
  <select id="slOther"><option value="9">unrelated</option></select>
</form>`;

describe("form parser", () => {
  it("should list the selectable sale days in page order", () => {
    expect(extractSalesDayLabels(FORM_HTML)).toEqual(["20/12/2026", "21/12/2026"]);
  });

  it("should find nothing on a page without the sale day select", () => {
    expect(extractSalesDayLabels("<html><body>Maintenance</body></html>")).toEqual([]);
  });

  it("should resolve a label to its option value", () => {
    expect(mapLabelToId(FORM_HTML, "21/12/2026")).toBe("102");
    expect(mapLabelToId(FORM_HTML, " 20/12/2026")).toBe("101");
    expect(mapLabelToId(FORM_HTML, "22/12/2026")).toBeNull();
    expect(mapLabelToId(FORM_HTML, "unrelated")).toBeNull();
  });

  it("should read session options ahead of the separator", () => {
    const raw =
      '<option value="">-- Chọn phiên --</option><option value="S1">09:00 - 11:00</option>' +
      '<option value="S2">13:00 - 15:00</option>||@@||<option value="X">ignored</option>';

    expect(parseSessionOptions(raw)).toEqual([
      { id: "S1", label: "09:00 - 11:00" },
      { id: "S2", label: "13:00 - 15:00" },
    ]);
  });

  it("should return no sessions for an empty response", () => {
    expect(parseSessionOptions("")).toEqual([]);
  });

  it("should resolve the captcha image against the base url", () => {
    expect(parseCaptchaImageRef('<img src="./Captcha.aspx?id=7" />', "https://site.test/")).toBe(
      "https://site.test/Captcha.aspx?id=7"
    );
    expect(parseCaptchaImageRef('<img src="https://cdn.test/c.png">', "https://site.test")).toBe(
      "https://cdn.test/c.png"
    );
    expect(parseCaptchaImageRef("<div>no image</div>", "https://site.test")).toBeNull();
  });
});
