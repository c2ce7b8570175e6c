import path from "path";
import { promises as fs } from "fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TrackLibrary } from "../../src/core/TrackLibrary";
import { NotFoundError, PersistenceError } from "../../src/core/Errors";
import { fixedClock, makeTempDir, removeTempDir } from "../helpers";
import { track } from "../fakes/platforms";

const NOW = "2026-03-01T10:00:00.000Z";

describe("TrackLibrary", () => {
  let dir: string;
  let filePath: string;

  const open = (extraPlatforms: string[] = ["soundcloud"]) =>
    TrackLibrary.open({ filePath, extraPlatforms, now: fixedClock(NOW) });

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = path.join(dir, "library.csv");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("starts empty when the file does not exist", async () => {
    const library = await open();
    expect(library.size).toBe(0);
    expect(library.platforms).toEqual(["soundcloud"]);
  });

  describe("recordTrack", () => {
    it("creates a record from the first artist", async () => {
      const library = await open();
      const record = library.recordTrack(
        { id: "s1", name: "Song", artists: ["Lead", "Feature"], album: "LP" },
        "p1"
      );

      expect(record).toEqual({
        sourceId: "s1",
        targetId: null,
        additionalPlatformIds: { soundcloud: null },
        trackName: "Song",
        artistName: "Lead",
        albumName: "LP",
        playlistIds: new Set(["p1"]),
        sourceAvailable: true,
        targetAvailable: null,
        additionalAvailability: { soundcloud: null },
        lastSyncedAt: null,
        notes: "",
      });
    });

    it("falls back to Unknown when a track lists no artist", async () => {
      const library = await open();
      expect(library.recordTrack({ id: "s1", name: "Song", artists: [] }).artistName).toBe(
        "Unknown"
      );
    });

    it("only grows playlist membership for a known track", async () => {
      const library = await open();
      library.recordTrack(track("s1", "Song", "Artist"), "p1");
      library.setTargetMatch("s1", "t1", true);

      const again = library.recordTrack(track("s1", "Renamed", "Someone Else"), "p2");

      expect(again.trackName).toBe("Song");
      expect(again.targetId).toBe("t1");
      expect(again.playlistIds).toEqual(new Set(["p1", "p2"]));
      expect(library.size).toBe(1);
    });

    it("hands out copies", async () => {
      const library = await open();
      const record = library.recordTrack(track("s1", "Song", "Artist"), "p1");
      record.playlistIds.add("tampered");

      expect(library.getTrack("s1")?.playlistIds).toEqual(new Set(["p1"]));
    });
  });

  describe("matches", () => {
    it("stamps the sync time and keeps targetId and availability consistent", async () => {
      const library = await open();
      library.recordTrack(track("s1", "Song", "Artist"), "p1");

      library.setTargetMatch("s1", "t1", true);

      const record = library.getTrack("s1");
      expect(record?.targetId).toBe("t1");
      expect(record?.targetAvailable).toBe(true);
      expect(record?.lastSyncedAt).toBe(NOW);
    });

    it("rejects an id without found or found without an id", async () => {
      const library = await open();
      library.recordTrack(track("s1", "Song", "Artist"));

      expect(() => library.setTargetMatch("s1", "t1", false)).toThrow(
        "Inconsistent match for track s1"
      );
      expect(() => library.setTargetMatch("s1", null, true)).toThrow(
        "Inconsistent match for track s1"
      );
    });

    it("throws NotFoundError for an unknown track", async () => {
      const library = await open();
      expect(() => library.setTargetMatch("missing", null, false)).toThrow(NotFoundError);
      expect(() => library.setPlatformMatch("missing", "soundcloud", null, false)).toThrow(
        NotFoundError
      );
    });

    it("records matches for additional platforms", async () => {
      const library = await open();
      library.recordTrack(track("s1", "Song", "Artist"));
      library.recordTrack(track("s2", "Other", "Artist"));

      library.setPlatformMatch("s1", "soundcloud", "sc-1", true);
      library.setPlatformMatch("s2", "soundcloud", null, false);

      expect(library.getTrack("s1")?.additionalPlatformIds).toEqual({ soundcloud: "sc-1" });
      expect(library.getPlatformStats("soundcloud")).toEqual({
        total: 2,
        matched: 1,
        unavailable: 1,
        pending: 0,
      });
    });
  });

  describe("sync queries", () => {
    it("tracks a playlist from first run to recheck", async () => {
      const library = await open();
      for (const id of ["A", "B", "C"]) {
        library.recordTrack(track(id, `Song ${id}`, "Artist"), "P1");
      }
      library.setTargetMatch("A", "tA", true);
      library.setTargetMatch("B", "tB", true);
      library.setTargetMatch("C", null, false);

      expect(library.getSyncStats("P1")).toEqual({
        total: 3,
        matched: 2,
        unavailable: 1,
        pending: 0,
      });
      expect(library.isPlaylistSynced("P1")).toBe(false);
      expect(library.getUnsyncedTracks("P1")).toEqual([]);
      expect(library.getUnsyncedTracks("P1", { recheck: true }).map((r) => r.sourceId)).toEqual([
        "C",
      ]);

      library.setTargetMatch("C", "tC", true);

      expect(library.getSyncStats("P1")).toEqual({
        total: 3,
        matched: 3,
        unavailable: 0,
        pending: 0,
      });
      expect(library.isPlaylistSynced("P1")).toBe(true);
    });

    it("lists never-searched members as unsynced", async () => {
      const library = await open();
      library.recordTrack(track("s1", "One", "Artist"), "p1");
      library.recordTrack(track("s2", "Two", "Artist"), "p1");
      library.recordTrack(track("s3", "Three", "Artist"), "p2");
      library.setTargetMatch("s1", "t1", true);

      expect(library.getUnsyncedTracks("p1").map((r) => r.sourceId)).toEqual(["s2"]);
      expect(library.getSyncStats("p1")).toEqual({
        total: 2,
        matched: 1,
        unavailable: 0,
        pending: 1,
      });
    });

    it("treats a playlist with unrecorded current tracks as unsynced", async () => {
      const library = await open();
      library.recordTrack(track("s1", "One", "Artist"), "p1");
      library.setTargetMatch("s1", "t1", true);

      expect(library.isPlaylistSynced("p1", ["s1"])).toBe(true);
      expect(library.isPlaylistSynced("p1", ["s1", "s2"])).toBe(false);
    });

    it("agrees with getUnsyncedTracks under recheck", async () => {
      const library = await open();
      library.recordTrack(track("s1", "One", "Artist"), "p1");
      library.recordTrack(track("s2", "Two", "Artist"), "p1");
      library.setTargetMatch("s1", "t1", true);
      library.setTargetMatch("s2", null, false);

      const unsynced = library.getUnsyncedTracks("p1", { recheck: true });
      expect(library.isPlaylistSynced("p1")).toBe(unsynced.length === 0);
    });
  });

  describe("persistence", () => {
    it("writes the documented header and reloads every field", async () => {
      const library = await open();
      library.recordTrack(
        { id: "s1", name: "Song, with comma", artists: ["Artist"], album: 'The "Album"' },
        "p2"
      );
      library.recordTrack(track("s1", "Song, with comma", "Artist"), "p1");
      library.recordTrack(track("s2", "Missing", "Artist"), "p1");
      library.setTargetMatch("s1", "t1", true);
      library.setTargetMatch("s2", null, false);
      library.setPlatformMatch("s1", "soundcloud", "sc-1", true);
      await library.persist();

      const contents = await fs.readFile(filePath, "utf-8");
      expect(contents.split("\n")[0]).toBe(
        "sourceId,targetId,soundcloudId,trackName,artistName,albumName,playlistIds,sourceAvailable,targetAvailable,soundcloudAvailable,lastSynced,notes"
      );
      expect(contents.split("\n")[1]).toBe(
        `s1,t1,sc-1,"Song, with comma",Artist,"The ""Album""","p1,p2",true,true,true,${NOW},`
      );

      const reloaded = await open([]);
      expect(reloaded.platforms).toEqual(["soundcloud"]);
      expect(reloaded.getTrack("s1")).toEqual(library.getTrack("s1"));
      expect(reloaded.getTrack("s2")).toEqual(library.getTrack("s2"));
    });

    it("keeps notes edited into the file", async () => {
      await fs.writeFile(
        filePath,
        "sourceId,targetId,trackName,artistName,albumName,playlistIds,sourceAvailable,targetAvailable,lastSynced,notes\n" +
          "s1,,Song,Artist,,p1,true,false,2026-01-01T00:00:00.000Z,region locked\n"
      );

      const library = await open([]);
      library.recordTrack(track("s2", "Other", "Artist"), "p1");
      await library.persist();

      const reloaded = await open([]);
      expect(reloaded.getTrack("s1")?.notes).toBe("region locked");
      expect(reloaded.getUnavailableTracks().map((record) => record.notes)).toEqual(["region locked"]);
    });

    it("treats a stored target id as available", async () => {
      await fs.writeFile(
        filePath,
        "sourceId,targetId,trackName,artistName,albumName,playlistIds,sourceAvailable,targetAvailable,lastSynced,notes\n" +
          "s1,t1,Song,Artist,,p1,true,false,,\n"
      );

      const library = await open([]);
      expect(library.getTrack("s1")?.targetAvailable).toBe(true);
    });

    it("refuses to load a corrupt file", async () => {
      await fs.writeFile(filePath, 'sourceId,trackName\ns1,"never closed\n');

      await expect(open()).rejects.toBeInstanceOf(PersistenceError);
      expect(await fs.readFile(filePath, "utf-8")).toBe(
        'sourceId,trackName\ns1,"never closed\n'
      );
    });

    it("exports confirmed-absent tracks", async () => {
      const library = await open();
      library.recordTrack(track("s1", "Found", "Artist", "LP"));
      library.recordTrack(track("s2", "Lost", "Artist", "EP"));
      library.recordTrack(track("s3", "Unsearched", "Artist"));
      library.setTargetMatch("s1", "t1", true);
      library.setTargetMatch("s2", null, false);

      const exportPath = path.join(dir, "out", "unavailable.csv");
      expect(await library.exportUnavailable(exportPath)).toBe(1);
      expect(await fs.readFile(exportPath, "utf-8")).toBe(
        "artistName,trackName,albumName,sourceId,notes\nArtist,Lost,EP,s2,\n"
      );
    });
  });
});
