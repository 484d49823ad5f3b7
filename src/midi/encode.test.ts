import { describe, it, expect } from "vitest";
import { parseMidi, writeMidi } from "midi-file";
import { encodeNotes, buildDiffMidi } from "./encode.js";
import { extractNotes } from "./extract.js";
import { createNoteEvent, noteKey } from "./note-event.js";
import type { NoteEvent } from "./types.js";

function note(pitch: number, start: number, duration: number, velocity = 100): NoteEvent {
  return createNoteEvent({ pitch, start, duration, velocity });
}

describe("encodeNotes", () => {
  it("encodes one note as on, off, end of track", () => {
    expect(encodeNotes([note(60, 0, 10, 100)])).toEqual([
      { deltaTime: 0, type: "noteOn", channel: 0, noteNumber: 60, velocity: 100 },
      { deltaTime: 10, type: "noteOff", channel: 0, noteNumber: 60, velocity: 0 },
      { deltaTime: 0, type: "endOfTrack", meta: true },
    ]);
  });

  it("emits only end of track for no notes", () => {
    expect(encodeNotes([])).toEqual([{ deltaTime: 0, type: "endOfTrack", meta: true }]);
  });

  it("puts a note-off before a note-on on the same tick", () => {
    const events = encodeNotes([note(60, 10, 10), note(60, 0, 10)]);
    expect(events.map(e => [e.type, e.deltaTime])).toEqual([
      ["noteOn", 0],
      ["noteOff", 10],
      ["noteOn", 0],
      ["noteOff", 10],
      ["endOfTrack", 0],
    ]);
  });

  it("does not depend on input order", () => {
    const notes = [note(60, 0, 480), note(64, 240, 240), note(67, 480, 120)];
    const reversed = [...notes].reverse();
    expect(encodeNotes(reversed)).toEqual(encodeNotes(notes));
  });

  it("offsets the first event from tick zero", () => {
    const [first] = encodeNotes([note(72, 960, 10)]);
    expect(first.deltaTime).toBe(960);
  });

  it("writes every event on the requested channel", () => {
    const events = encodeNotes([note(60, 0, 10)], { channel: 9 });
    expect(events[0]).toMatchObject({ type: "noteOn", channel: 9 });
    expect(events[1]).toMatchObject({ type: "noteOff", channel: 9 });
  });

  it("raises a zero note-on velocity to 1", () => {
    const [first] = encodeNotes([note(60, 0, 10, 0)]);
    expect(first).toMatchObject({ type: "noteOn", velocity: 1 });
  });
});

describe("buildDiffMidi", () => {
  it("builds a single-track format 0 file", () => {
    const data = buildDiffMidi([note(60, 0, 10)], 96);
    expect(data.header).toEqual({ format: 0, numTracks: 1, ticksPerBeat: 96 });
    expect(data.tracks).toHaveLength(1);
  });

  it("recovers the same placements after writing and re-reading", () => {
    const notes = [
      note(60, 0, 30, 80),
      note(60, 10, 10, 90), // nested inside the first
      note(60, 30, 15, 70), // starts where the first ends
      note(64, 5, 100, 64),
      note(67, 200, 1, 127),
    ];

    const bytes = new Uint8Array(writeMidi(buildDiffMidi(notes, 480)));
    const reread = parseMidi(bytes);
    const extracted = extractNotes(reread.tracks);

    expect(reread.header.ticksPerBeat).toBe(480);
    expect(extracted.map(noteKey).sort()).toEqual(notes.map(noteKey).sort());
  });
});
