/**
 * Tests for platform detection and the font directory map.
 */

import { describe, it, expect } from "vitest";
import { FontListError } from "../errors";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils";
import { joinFontPath, resolveFontDirectory, resolvePlatform } from "./font-directories";

describe("resolvePlatform", () => {
  it.each([
    ["win32", "Windows"],
    ["linux", "Linux"],
    ["darwin", "MacOS"],
  ] as const)("maps %s to %s", (nodePlatform, expected) => {
    expect(resolvePlatform(createMockPlatformInfo({ platform: nodePlatform }))).toBe(expected);
  });

  it.each(["freebsd", "aix", "sunos"] as const)("rejects %s", (nodePlatform) => {
    const platformInfo = createMockPlatformInfo({ platform: nodePlatform });

    expect(() => resolvePlatform(platformInfo)).toThrow(FontListError);
    try {
      resolvePlatform(platformInfo);
    } catch (error) {
      expect(error).toBeInstanceOf(FontListError);
      expect((error as FontListError).code).toBe("UNSUPPORTED_PLATFORM");
      expect((error as FontListError).message).toBe(
        `Unsupported platform: ${nodePlatform}. Fonts can be listed on Windows, Linux and macOS.`
      );
    }
  });
});

describe("resolveFontDirectory", () => {
  describe("Linux", () => {
    const info = createMockPlatformInfo({ platform: "linux", homeDir: "/home/test" });

    it("uses ~/.local/share/fonts for CurrentUser", () => {
      expect(resolveFontDirectory("Linux", "CurrentUser", info)).toBe(
        "/home/test/.local/share/fonts"
      );
    });

    it("uses /usr/share/fonts for AllUsers", () => {
      expect(resolveFontDirectory("Linux", "AllUsers", info)).toBe("/usr/share/fonts");
    });
  });

  describe("MacOS", () => {
    const info = createMockPlatformInfo({ platform: "darwin", homeDir: "/Users/test" });

    it("uses ~/Library/Fonts for CurrentUser", () => {
      expect(resolveFontDirectory("MacOS", "CurrentUser", info)).toBe("/Users/test/Library/Fonts");
    });

    it("uses /Library/Fonts for AllUsers", () => {
      expect(resolveFontDirectory("MacOS", "AllUsers", info)).toBe("/Library/Fonts");
    });
  });

  describe("Windows", () => {
    const info = createMockPlatformInfo({
      platform: "win32",
      homeDir: "C:\\Users\\Test",
      env: { LOCALAPPDATA: "C:\\Users\\Test\\AppData\\Local", windir: "C:\\WINDOWS" },
    });

    it("uses %LOCALAPPDATA%\\Microsoft\\Windows\\Fonts for CurrentUser", () => {
      expect(resolveFontDirectory("Windows", "CurrentUser", info)).toBe(
        "C:\\Users\\Test\\AppData\\Local\\Microsoft\\Windows\\Fonts"
      );
    });

    it("uses %WINDIR%\\Fonts for AllUsers, whatever the variable's casing", () => {
      expect(resolveFontDirectory("Windows", "AllUsers", info)).toBe("C:\\WINDOWS\\Fonts");
    });

    it("falls back to the home directory when LOCALAPPDATA is unset", () => {
      const bare = createMockPlatformInfo({ platform: "win32", homeDir: "D:\\Home\\Test", env: {} });

      expect(resolveFontDirectory("Windows", "CurrentUser", bare)).toBe(
        "D:\\Home\\Test\\AppData\\Local\\Microsoft\\Windows\\Fonts"
      );
    });

    it("falls back to SystemRoot, then C:\\Windows, when WINDIR is unset", () => {
      const withSystemRoot = createMockPlatformInfo({
        platform: "win32",
        env: { SystemRoot: "E:\\Windows" },
      });
      const bare = createMockPlatformInfo({ platform: "win32", env: {} });

      expect(resolveFontDirectory("Windows", "AllUsers", withSystemRoot)).toBe("E:\\Windows\\Fonts");
      expect(resolveFontDirectory("Windows", "AllUsers", bare)).toBe("C:\\Windows\\Fonts");
    });
  });
});

describe("joinFontPath", () => {
  it("joins with backslashes on Windows", () => {
    expect(joinFontPath("Windows", "C:\\Windows\\Fonts", "arial.ttf")).toBe(
      "C:\\Windows\\Fonts\\arial.ttf"
    );
  });

  it("joins with forward slashes elsewhere", () => {
    expect(joinFontPath("MacOS", "/Library/Fonts", "Arial.ttf")).toBe("/Library/Fonts/Arial.ttf");
  });
});
