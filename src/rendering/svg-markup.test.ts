import { fmt, escapeXml, el, opacityAttr, svgDocument } from "./svg-markup";

describe("fmt", () => {
  it("keeps at most two decimals and drops trailing zeros", () => {
    expect(fmt(12.5)).toBe("12.5");
    expect(fmt(3)).toBe("3");
    expect(fmt(1.23456)).toBe("1.23");
  });

  it("never writes negative zero", () => {
    expect(fmt(-0.001)).toBe("0");
  });
});

describe("el", () => {
  it("self-closes without children and skips undefined attributes", () => {
    expect(el("rect", { x: 1, y: undefined, fill: "a\"b" })).toBe('<rect x="1" fill="a&quot;b"/>');
  });

  it("wraps children", () => {
    expect(el("g", { class: "points" }, "<circle/>")).toBe('<g class="points"><circle/></g>');
  });
});

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml("<a & b>")).toBe("&lt;a &amp; b&gt;");
  });
});

describe("opacityAttr", () => {
  it("is omitted when fully opaque", () => {
    expect(opacityAttr(1)).toBeUndefined();
    expect(opacityAttr(0.4)).toBe(0.4);
  });
});

describe("svgDocument", () => {
  it("sizes the root element", () => {
    const doc = svgDocument(30, 20, "<g/>");
    expect(doc).toContain('<svg xmlns="http://www.w3.org/2000/svg" width="30" height="20" viewBox="0 0 30 20">');
    expect(doc).toContain("\n<g/>\n</svg>\n");
  });
});
