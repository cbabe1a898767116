import { describe, expect, it } from "vitest";
import { resolveAudioExtension } from "./audio-format.js";

describe("resolveAudioExtension", () => {
  it("accepts the supported extensions", () => {
    expect(resolveAudioExtension("clip.wav")).toBe(".wav");
    expect(resolveAudioExtension("clip.mp3")).toBe(".mp3");
    expect(resolveAudioExtension("clip.m4a")).toBe(".m4a");
  });

  it("is case-insensitive", () => {
    expect(resolveAudioExtension("Interview.WAV")).toBe(".wav");
  });

  it("uses only the last extension", () => {
    expect(resolveAudioExtension("episode.final.mp3")).toBe(".mp3");
    expect(resolveAudioExtension("episode.mp3.txt")).toBeNull();
  });

  it("rejects unsupported extensions", () => {
    expect(resolveAudioExtension("notes.txt")).toBeNull();
    expect(resolveAudioExtension("track.flac")).toBeNull();
  });

  it("rejects names without an extension", () => {
    expect(resolveAudioExtension("recording")).toBeNull();
    expect(resolveAudioExtension("")).toBeNull();
  });

  it("treats dotfiles as having no extension", () => {
    expect(resolveAudioExtension(".wav")).toBeNull();
  });
});
