import { describe, it, expect } from "@jest/globals";
import {
  canonicalizeReference,
  extractIdentifier,
  feedAccountName,
  isRemoteReference,
} from "../src/lib/identifiers";

const ID = "abcDEF12345";
const WATCH = `https://www.youtube.com/watch?v=${ID}`;

describe("identifiers", () => {
  describe("canonicalizeReference", () => {
    it("rewrites short links and shorts to the watch URL", () => {
      expect(canonicalizeReference(`https://youtu.be/${ID}?si=share123`)).toBe(WATCH);
      expect(canonicalizeReference(`https://www.youtube.com/shorts/${ID}`)).toBe(WATCH);
      expect(canonicalizeReference(`https://m.youtube.com/watch?v=${ID}&t=42`)).toBe(WATCH);
    });

    it("leaves other URLs trimmed but unchanged", () => {
      expect(canonicalizeReference("  https://example.com/media/1.mp3 ")).toBe(
        "https://example.com/media/1.mp3",
      );
    });
  });

  describe("extractIdentifier", () => {
    it("maps every variant of one video to the same identifier", () => {
      const variants = [
        WATCH,
        `https://youtu.be/${ID}`,
        `https://www.youtube.com/shorts/${ID}`,
        `https://www.youtube.com/watch?v=${ID}&list=PLtest&index=4`,
        `https://www.youtube.com/embed/${ID}`,
        `https://www.youtube.com/live/${ID}?feature=share`,
      ];
      expect(new Set(variants.map(extractIdentifier))).toEqual(new Set([ID]));
    });

    it("extracts TikTok and Twitch identifiers", () => {
      expect(
        extractIdentifier("https://www.tiktok.com/@someone/video/7234567890123456789?lang=en"),
      ).toBe("7234567890123456789");
      expect(extractIdentifier("https://www.twitch.tv/videos/1234567")).toBe("1234567");
      expect(extractIdentifier("https://clips.twitch.tv/FunnyClipSlug")).toBe("FunnyClipSlug");
      expect(extractIdentifier("https://www.twitch.tv/someone/clip/OtherSlug-ab")).toBe(
        "OtherSlug-ab",
      );
    });

    it("extracts SOOP and AfreecaTV VOD identifiers", () => {
      expect(extractIdentifier("https://vod.sooplive.co.kr/player/123456789")).toBe("123456789");
      expect(extractIdentifier("https://vod.sooplive.co.kr/player/123456789/catch?t=30")).toBe("123456789");
      expect(extractIdentifier("https://vod.afreecatv.com/player/98765")).toBe("98765");
      expect(extractIdentifier("https://bj.afreecatv.com/someone/vod/review/4455")).toBe("4455");
    });

    it("falls back to the canonical URL", () => {
      expect(extractIdentifier(" https://example.com/media/1.mp3")).toBe(
        "https://example.com/media/1.mp3",
      );
    });

    it("does not accept malformed video ids", () => {
      expect(extractIdentifier("https://youtu.be/short")).toBe("https://youtu.be/short");
    });
  });

  it("recognizes remote references and feed accounts", () => {
    expect(isRemoteReference("HTTPS://example.com/a")).toBe(true);
    expect(isRemoteReference("./clips/a.mp3")).toBe(false);
    expect(feedAccountName("https://www.tiktok.com/@some.one?lang=en")).toBe("some.one");
    expect(feedAccountName(WATCH)).toBeNull();
  });
});
