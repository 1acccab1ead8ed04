// tests/transformer.test.ts

import { MalformedRecordError } from "../src/errors";
import {
  deriveTimeFields,
  isoWeek,
  toCanonicalText,
  transformLogRecord,
  transformLogRecords,
  transformSongRecord,
  transformSongRecords,
} from "../src/transformer";

jest.mock("../src/utils/logger", () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import { logger } from "../src/utils/logger";

const FILE = "/data/log_data/events.json";

function songRecord(overrides: Record<string, unknown> = {}) {
  return {
    song_id: "S1",
    title: "Song A",
    artist_id: "AR1",
    year: 2000,
    duration: 210.5,
    artist_name: "Artist A",
    artist_location: "",
    artist_latitude: NaN,
    artist_longitude: NaN,
    ...overrides,
  };
}

function logRecord(overrides: Record<string, unknown> = {}) {
  return {
    page: "NextSong",
    ts: 1541106106796,
    userId: "8",
    firstName: "Kaylee",
    lastName: "Summers",
    gender: "F",
    level: "free",
    song: "Song A",
    artist: "Artist A",
    length: 210.5,
    sessionId: 139,
    location: "Phoenix-Mesa-Scottsdale, AZ",
    userAgent: "Mozilla/5.0",
    ...overrides,
  };
}

beforeEach(() => {
  jest.clearAllMocks();
});

describe("toCanonicalText", () => {
  it("keeps strings and stringifies numbers", () => {
    expect(toCanonicalText("Memphis, TN")).toBe("Memphis, TN");
    expect(toCanonicalText(210.5)).toBe("210.5");
    expect(toCanonicalText(2000)).toBe("2000");
  });

  it("maps missing values to sentinels", () => {
    expect(toCanonicalText(NaN)).toBe("NaN");
    expect(toCanonicalText(null)).toBe("None");
    expect(toCanonicalText(undefined)).toBe("None");
  });
});

describe("transformSongRecord", () => {
  it("projects a song row and an artist row as text", () => {
    const { song, artist } = transformSongRecord(songRecord(), "/s.json");
    expect(song).toEqual({
      songId: "S1",
      title: "Song A",
      artistId: "AR1",
      year: "2000",
      duration: "210.5",
    });
    expect(artist).toEqual({
      artistId: "AR1",
      name: "Artist A",
      location: "",
      latitude: "NaN",
      longitude: "NaN",
    });
  });

  it("keeps coordinates that are present", () => {
    const { artist } = transformSongRecord(
      songRecord({
        artist_location: "Memphis, TN",
        artist_latitude: 35.14968,
        artist_longitude: -90.04892,
      }),
      "/s.json"
    );
    expect(artist.location).toBe("Memphis, TN");
    expect(artist.latitude).toBe("35.14968");
    expect(artist.longitude).toBe("-90.04892");
  });

  it("sends null or absent coordinates as NaN for the float columns", () => {
    const { artist } = transformSongRecord(
      songRecord({ artist_latitude: null, artist_longitude: undefined }),
      "/s.json"
    );
    expect(artist.latitude).toBe("NaN");
    expect(artist.longitude).toBe("NaN");
  });

  it("treats absent optional artist fields as missing", () => {
    const { artist } = transformSongRecord(
      songRecord({ artist_location: undefined }),
      "/s.json"
    );
    expect(artist.location).toBe("None");
  });

  it("throws MalformedRecordError when a required field is absent", () => {
    const record = songRecord({ song_id: undefined });
    expect(() => transformSongRecord(record, "/s.json")).toThrow(
      MalformedRecordError
    );
  });

  it("rejects a non-positive duration", () => {
    expect(() =>
      transformSongRecord(songRecord({ duration: 0 }), "/s.json")
    ).toThrow(/duration/);
  });
});

describe("transformSongRecords", () => {
  it("skips malformed records under the skip policy", () => {
    const result = transformSongRecords(
      [songRecord(), { title: "no ids" }, songRecord({ song_id: "S9" })],
      "/s.json",
      "skip"
    );
    expect(result.rows.map((r) => r.song.songId)).toEqual(["S1", "S9"]);
    expect(result.skipped).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("throws under the abort policy", () => {
    expect(() =>
      transformSongRecords([{ title: "no ids" }], "/s.json", "abort")
    ).toThrow(MalformedRecordError);
  });
});

describe("isoWeek", () => {
  it("follows ISO-8601 week numbering at year boundaries", () => {
    expect(isoWeek(new Date("2021-01-01T00:00:00Z"))).toBe(53);
    expect(isoWeek(new Date("2019-01-01T00:00:00Z"))).toBe(1);
    expect(isoWeek(new Date("2018-11-01T21:01:46Z"))).toBe(44);
  });
});

describe("deriveTimeFields", () => {
  it("derives calendar fields in UTC", () => {
    expect(deriveTimeFields(1541106106796)).toEqual({
      startTime: "2018-11-01T21:01:46.796Z",
      hour: 21,
      day: 1,
      week: 44,
      month: 11,
      year: 2018,
      weekday: 3,
    });
  });

  it("uses Monday = 0 for weekdays", () => {
    // 2019-01-01 was a Tuesday
    expect(deriveTimeFields(1546300800000).weekday).toBe(1);
    // 2018-11-04 was a Sunday
    expect(deriveTimeFields(Date.UTC(2018, 10, 4, 12)).weekday).toBe(6);
  });

  it("keeps the calendar year when the ISO week belongs to the previous year", () => {
    const time = deriveTimeFields(1609545599999);
    expect(time.startTime).toBe("2021-01-01T23:59:59.999Z");
    expect(time.week).toBe(53);
    expect(time.year).toBe(2021);
    expect(time.hour).toBe(23);
  });

  it("is deterministic", () => {
    expect(deriveTimeFields(1541107053796)).toEqual(
      deriveTimeFields(1541107053796)
    );
  });
});

describe("transformLogRecord", () => {
  it("builds the time, user and song play rows", () => {
    const event = transformLogRecord(logRecord(), FILE);
    expect(event.time.startTime).toBe("2018-11-01T21:01:46.796Z");
    expect(event.user).toEqual({
      userId: 8,
      firstName: "Kaylee",
      lastName: "Summers",
      gender: "F",
      level: "free",
    });
    expect(event.songPlay).toEqual({
      startTime: "2018-11-01T21:01:46.796Z",
      userId: 8,
      level: "free",
      sessionId: 139,
      location: "Phoenix-Mesa-Scottsdale, AZ",
      userAgent: "Mozilla/5.0",
    });
    expect(event.lookup).toEqual({
      title: "Song A",
      artistName: "Artist A",
      duration: 210.5,
    });
  });

  it("accepts a missing location and user agent", () => {
    const event = transformLogRecord(
      logRecord({ location: null, userAgent: undefined, gender: "" }),
      FILE
    );
    expect(event.songPlay.location).toBe("");
    expect(event.songPlay.userAgent).toBe("");
    expect(event.user.gender).toBeNull();
  });

  it("has no lookup when the song is unknown", () => {
    const event = transformLogRecord(logRecord({ song: null }), FILE);
    expect(event.lookup).toBeNull();
  });

  it("rejects an unparseable ts", () => {
    expect(() => transformLogRecord(logRecord({ ts: "yesterday" }), FILE)).toThrow(
      MalformedRecordError
    );
  });

  it("rejects a ts outside the representable range", () => {
    expect(() => transformLogRecord(logRecord({ ts: 1e20 }), FILE)).toThrow(
      /ts: Timestamp out of range/
    );
  });

  it("accepts a numeric-string ts", () => {
    const event = transformLogRecord(logRecord({ ts: "1541106106796" }), FILE);
    expect(event.time.startTime).toBe("2018-11-01T21:01:46.796Z");
  });
});

describe("transformLogRecords", () => {
  it("drops everything except NextSong events and keeps file order", () => {
    const result = transformLogRecords(
      [
        logRecord({ ts: 1541107053796 }),
        logRecord({ page: "Home" }),
        { page: "Logout", userId: "" },
        logRecord({ ts: 1541106106796 }),
      ],
      FILE,
      "skip"
    );
    expect(result.rows.map((e) => e.time.startTime)).toEqual([
      "2018-11-01T21:17:33.796Z",
      "2018-11-01T21:01:46.796Z",
    ]);
    expect(result.skipped).toBe(0);
  });

  it("produces nothing for a file without NextSong events", () => {
    const result = transformLogRecords(
      [logRecord({ page: "Home" }), logRecord({ page: "Settings" })],
      FILE,
      "abort"
    );
    expect(result.rows).toEqual([]);
  });

  it("skips a malformed NextSong event under the skip policy", () => {
    const result = transformLogRecords(
      [logRecord({ ts: "not-a-time" }), logRecord()],
      FILE,
      "skip"
    );
    expect(result.rows).toHaveLength(1);
    expect(result.skipped).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining("Skipping malformed record:")
    );
  });

  it("throws on a malformed NextSong event under the abort policy", () => {
    expect(() =>
      transformLogRecords([logRecord({ userId: "" })], FILE, "abort")
    ).toThrow(MalformedRecordError);
  });
});
