import { describe, expect, it } from "vitest";
import { DEFAULT_USER_AGENT, fingerprintScript, randomViewport } from "../src/core/browser.js";

describe("browser fingerprint", () => {
  it("picks a desktop-sized viewport", () => {
    expect(randomViewport(() => 0)).toEqual({ width: 1024, height: 768 });
    expect(randomViewport(() => 0.5)).toEqual({ width: 1472, height: 924 });
    expect(randomViewport(() => 0.999999)).toEqual({ width: 1919, height: 1079 });
  });

  it("pins the user agent and hides the webdriver flag", () => {
    const lines = fingerprintScript(DEFAULT_USER_AGENT).split("\n");
    expect(lines[0]).toBe("Object.defineProperty(navigator, 'webdriver', { get: () => undefined });");
    expect(lines[1]).toBe(`Object.defineProperty(navigator, 'userAgent', { get: () => "${DEFAULT_USER_AGENT}" });`);
  });
});
