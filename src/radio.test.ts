import { describe, expect, it, vi } from "vitest"
import { EmptyLibraryError, RadioStateError } from "./errors.ts"
import { FALLBACK_COMMENTARY } from "./radio.ts"
import { FakeCommentary, MemorySink, delay, entryAt, makeRadio } from "./test/fakes.ts"

const LIBRARY = { AlbumA: ["t1", "t2"], AlbumB: ["t3"] }

describe("Radio", () => {
  describe("open", () => {
    it("plays the first queue entry and hosts it", async () => {
      const { radio, player, voice, fx } = makeRadio(LIBRARY)

      const entry = await radio.open()
      const first = entryAt(radio, 0)

      expect(entry).toMatchObject({
        album: first.album,
        track: first.track.name,
        commentary: `That was ${first.track.name} from ${first.album}`,
      })
      expect(radio.history()).toHaveLength(1)
      expect(player.loaded).toBe(first.track.path)
      expect(fx.fired).toEqual(["airhorn"])
      expect(voice.spoken).toEqual([`That was ${first.track.name} from ${first.album}`])
      expect(radio.status().state).toBe("playing")
    })

    it("ducks to the duck level and restores the music level", async () => {
      const { radio, player } = makeRadio(LIBRARY, { musicVolume: 90, duckVolume: 25 })

      await radio.open()

      expect(player.calls.slice(0, 2)).toEqual(["stop", `play ${entryAt(radio, 0).track.path}`])
      expect(player.volumes()).toEqual([90, 25, 90])
    })

    it("rejects an empty library", async () => {
      const { radio } = makeRadio({})
      await expect(radio.open()).rejects.toBeInstanceOf(EmptyLibraryError)
    })

    it("cannot be started twice", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()
      await expect(radio.open()).rejects.toBeInstanceOf(RadioStateError)
    })

    it("records nothing when the player cannot start the track", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      player.failPlay = true

      await expect(radio.open()).resolves.toBeNull()
      expect(radio.history()).toEqual([])
    })
  })

  describe("commentary", () => {
    it("falls back when the commentary source fails", async () => {
      const commentary = new FakeCommentary(() => {
        throw new Error("connection refused")
      })
      const { radio, voice } = makeRadio(LIBRARY, { commentary })

      const entry = await radio.open()

      expect(entry?.commentary).toBe(FALLBACK_COMMENTARY)
      expect(radio.history()).toHaveLength(1)
      expect(voice.spoken).toEqual([FALLBACK_COMMENTARY])
    })

    it("falls back when the commentary source is too slow", async () => {
      const commentary = new FakeCommentary(() => new Promise<string>(() => {}))
      const { radio } = makeRadio(LIBRARY, { commentary, commentaryTimeoutMs: 20 })

      const entry = await radio.open()

      expect(entry?.commentary).toBe(FALLBACK_COMMENTARY)
    })

    it("falls back on blank commentary", async () => {
      const commentary = new FakeCommentary(() => "   ")
      const { radio } = makeRadio(LIBRARY, { commentary })

      expect((await radio.open())?.commentary).toBe(FALLBACK_COMMENTARY)
    })

    it("keeps playing when a history sink fails", async () => {
      const broken = new MemorySink(true)
      const working = new MemorySink()
      const { radio } = makeRadio(LIBRARY, { sinks: [broken, working] })

      const entry = await radio.open()

      expect(radio.history()).toHaveLength(1)
      expect(working.rows).toEqual([entry])
    })
  })

  describe("skip", () => {
    it("advances through the queue and records each start", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      await radio.open()

      await radio.skip()
      await radio.skip()

      const history = radio.history()
      expect(history).toHaveLength(3)
      expect(radio.status().cursor).toBe(2)
      expect(history.map((entry) => entry.track)).toEqual(
        radio.queueSnapshot().map((entry) => entry.track.name),
      )
      expect(history[0]?.track).not.toBe(history[1]?.track)
      expect(history[1]?.track).not.toBe(history[2]?.track)
      expect(player.loaded).toBe(entryAt(radio, 2).track.path)
    })

    it("wraps around at the end of the queue", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()

      for (let i = 0; i < 3; i++) await radio.skip()

      expect(radio.status().cursor).toBe(0)
      expect(radio.history()).toHaveLength(4)
    })

    it("keeps the cursor and history consistent under concurrent skips", async () => {
      let calls = 0
      const commentary = new FakeCommentary(async (track) => {
        const call = calls++
        // Later requests answer first.
        await delay(Math.max(0, 35 - call * 5))
        return `#${call} ${track.track}`
      })
      const { radio, player, voice } = makeRadio(
        { AlbumA: ["a1", "a2"], AlbumB: ["b1", "b2"] },
        { commentary },
      )
      await radio.open()

      await Promise.all(Array.from({ length: 6 }, () => radio.skip()))
      await radio.settled()

      const queue = radio.queueSnapshot()
      const expected = [0, 1, 2, 3, 0, 1, 2].map((cursor, i) => {
        const name = queue[cursor]?.track.name
        return `#${i} ${name}`
      })

      expect(radio.status().cursor).toBe(6 % 4)
      expect(radio.history().map((entry) => entry.commentary)).toEqual(expected)
      expect(voice.spoken).toEqual([expected[0], expected[6]])
      expect(player.volume).toBe(80)
      expect(radio.status().state).toBe("playing")
    })

    it("advances when the player reports the end of a track", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      await radio.open()

      player.end()

      await vi.waitFor(() => expect(radio.history()).toHaveLength(2))
      expect(radio.status().cursor).toBe(1)
      expect(player.loaded).toBe(entryAt(radio, 1).track.path)
    })

    it("is ignored before the radio starts", async () => {
      const { radio, player } = makeRadio(LIBRARY)

      await expect(radio.skip()).resolves.toBeNull()
      expect(player.calls).toEqual([])
    })
  })

  describe("slow commentary", () => {
    /** Answers the first request at once and holds the second until released. */
    function heldSecondIntro() {
      let release: (text: string) => void = () => {}
      let calls = 0
      const commentary = new FakeCommentary((track) => {
        if (calls++ !== 1) return `intro ${track.track}`
        return new Promise<string>((resolve) => {
          release = resolve
        })
      })
      return { commentary, release: (text: string) => release(text) }
    }

    it("does not hold up pause or mood changes", async () => {
      const { commentary, release } = heldSecondIntro()
      const { radio } = makeRadio(LIBRARY, { commentary })
      await radio.open()

      const skipped = radio.skip()
      await vi.waitFor(() => expect(commentary.requests).toHaveLength(2))

      const first = await Promise.race([
        skipped.then(() => "skip"),
        Promise.all([radio.pause(), radio.setMood("rainy")]).then(() => "controls"),
      ])
      expect(first).toBe("controls")
      expect(radio.status()).toMatchObject({ state: "paused", mood: "rainy", cursor: 1 })

      release("late intro")
      await expect(skipped).resolves.toMatchObject({ commentary: "late intro" })
      expect(radio.status().state).toBe("paused")
    })

    it("speaks only the intro of the track now playing", async () => {
      const { commentary, release } = heldSecondIntro()
      const { radio, voice } = makeRadio(LIBRARY, { commentary })
      await radio.open()

      const skipped = radio.skip()
      await vi.waitFor(() => expect(commentary.requests).toHaveLength(2))
      const skippedAgain = radio.skip()
      await vi.waitFor(() => expect(voice.spoken).toHaveLength(2))
      release("late intro")
      await Promise.all([skipped, skippedAgain])

      const names = radio.queueSnapshot().map((entry) => entry.track.name)
      expect(voice.spoken).toEqual([`intro ${names[0]}`, `intro ${names[2]}`])
      expect(radio.history().map((entry) => entry.commentary)).toEqual([
        `intro ${names[0]}`,
        "late intro",
        `intro ${names[2]}`,
      ])
    })
  })

  describe("previous", () => {
    it("does not go below the first entry", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()

      const entry = await radio.previous()

      expect(radio.status().cursor).toBe(0)
      expect(entry?.track).toBe(entryAt(radio, 0).track.name)
      expect(radio.history()).toHaveLength(2)
    })

    it("goes back one entry", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      await radio.open()
      await radio.skip()
      await radio.skip()

      await radio.previous()

      expect(radio.status().cursor).toBe(1)
      expect(player.loaded).toBe(entryAt(radio, 1).track.path)
    })
  })

  describe("pause and resume", () => {
    it("toggles the player without touching queue or history", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      await radio.open()

      expect(await radio.pause()).toBe(true)
      expect(player.paused).toBe(true)
      expect(radio.status().state).toBe("paused")
      expect(await radio.pause()).toBe(false)

      expect(await radio.resume()).toBe(true)
      expect(player.paused).toBe(false)
      expect(radio.status().state).toBe("playing")
      expect(await radio.resume()).toBe(false)

      expect(radio.status().cursor).toBe(0)
      expect(radio.history()).toHaveLength(1)
    })
  })

  describe("mood", () => {
    // With random() always 0 the shuffle yields Midnight Rain, Coffee Break, Sunrise Drive.
    const MOOD_LIBRARY = { A: ["Sunrise Drive", "Midnight Rain"], B: ["Coffee Break"] }

    it("plays the suggested track next", async () => {
      const commentary = new FakeCommentary()
      commentary.suggestion = 'Sure! "Sunrise Drive" fits that mood.'
      const { radio } = makeRadio(MOOD_LIBRARY, { commentary, random: () => 0 })
      await radio.open()

      await radio.setMood("golden hour")
      const entry = await radio.skip()

      expect(commentary.moodRequests).toEqual([
        {
          mood: "golden hour",
          current: { album: "A", track: "Midnight Rain" },
          candidates: ["Coffee Break", "Sunrise Drive"],
        },
      ])
      expect(entry?.track).toBe("Sunrise Drive")
      expect(radio.status()).toMatchObject({ cursor: 0, queueLength: 4, mood: "golden hour" })
    })

    it("advances normally when nothing matches", async () => {
      const commentary = new FakeCommentary()
      commentary.suggestion = "Never heard of it"
      const { radio } = makeRadio(MOOD_LIBRARY, { commentary, random: () => 0 })
      await radio.open()
      await radio.setMood("anything")

      const entry = await radio.skip()

      expect(entry?.track).toBe("Coffee Break")
      expect(radio.status()).toMatchObject({ cursor: 1, queueLength: 3 })
    })

    it("advances normally when the lookup fails", async () => {
      const commentary = new FakeCommentary()
      commentary.suggestion = new Error("model offline")
      const { radio } = makeRadio(MOOD_LIBRARY, { commentary, random: () => 0 })
      await radio.open()
      await radio.setMood("anything")

      expect((await radio.skip())?.track).toBe("Coffee Break")
    })

    it("is not consulted once cleared", async () => {
      const commentary = new FakeCommentary()
      const { radio } = makeRadio(MOOD_LIBRARY, { commentary })
      await radio.open()
      await radio.setMood("rainy")
      await radio.setMood("   ")

      await radio.skip()

      expect(radio.status().mood).toBeNull()
      expect(commentary.moodRequests).toEqual([])
    })
  })

  describe("perform", () => {
    it("sets and clears the mood", async () => {
      const { radio } = makeRadio(LIBRARY)

      const set = await radio.perform("mood chill vibes")
      expect(set).toMatchObject({ ok: true, command: "mood", mood: "chill vibes" })
      expect(radio.status().mood).toBe("chill vibes")

      const cleared = await radio.perform("mood")
      expect(cleared).toMatchObject({ ok: true, command: "mood", mood: null })
      expect(radio.status().mood).toBeNull()
    })

    it("reports unrecognized commands", async () => {
      const { radio } = makeRadio(LIBRARY)

      await expect(radio.perform("bogus")).resolves.toEqual({
        ok: false,
        command: "unrecognized",
        message: "Unrecognized command: bogus",
      })
    })

    it("skips on next", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()

      const result = await radio.perform("  NEXT ")

      expect(result.ok).toBe(true)
      expect(result.command).toBe("skip")
      expect(radio.status().cursor).toBe(1)
    })

    it("reports the current track", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()
      const { album, track } = entryAt(radio, 0)

      await expect(radio.perform("now")).resolves.toEqual({
        ok: true,
        command: "now",
        message: `${album} - ${track.name}`,
        nowPlaying: { album, track: track.name },
      })
    })

    it("selects a voice by substring", async () => {
      const { radio } = makeRadio(LIBRARY)

      const result = await radio.perform("voice MA")
      expect(result).toMatchObject({ ok: true, voice: { name: "Marin", id: "marin" } })
      expect(radio.status().voice).toEqual({ name: "Marin", id: "marin" })

      const missing = await radio.perform("voice zzz")
      expect(missing).toMatchObject({ ok: false, command: "voice", voice: null })
    })

    it("pauses on stop and resumes on play", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()

      expect(await radio.perform("stop")).toMatchObject({ ok: true, command: "pause" })
      expect(await radio.perform("play")).toMatchObject({ ok: true, command: "resume" })
    })

    it("does not skip before the radio starts", async () => {
      const { radio } = makeRadio(LIBRARY)

      await expect(radio.perform("skip")).resolves.toMatchObject({
        ok: false,
        message: "Radio is not playing",
      })
    })
  })

  describe("levels", () => {
    it("applies a new music level right away", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      await radio.open()

      const levels = await radio.setLevels({ music: 150, duck: 10 })

      expect(levels).toEqual({ music: 100, duck: 10 })
      expect(player.volume).toBe(100)
    })
  })

  describe("supervision", () => {
    it("replays the current track when the player stalls", async () => {
      const { radio, player } = makeRadio(LIBRARY, { healthCheckMs: 5 })
      const running = radio.start()
      await vi.waitFor(() => expect(radio.history()).toHaveLength(1))

      player.playing = false
      await vi.waitFor(() => expect(player.playing).toBe(true))

      expect(player.calls.filter((call) => call.startsWith("play "))).toEqual([
        `play ${entryAt(radio, 0).track.path}`,
        `play ${entryAt(radio, 0).track.path}`,
      ])
      expect(radio.history()).toHaveLength(1)

      await radio.stop()
      await expect(running).resolves.toBeUndefined()
    })

    it("does not replay a track that ends during the check", async () => {
      const { radio, player } = makeRadio(LIBRARY)
      await radio.open()
      player.beforeIsPlaying = () => {
        player.beforeIsPlaying = null
        player.end()
      }

      await expect(radio.checkHealth()).resolves.toBe(false)
      await vi.waitFor(() => expect(radio.history()).toHaveLength(2))

      expect(player.calls.filter((call) => call.startsWith("play "))).toEqual([
        `play ${entryAt(radio, 0).track.path}`,
        `play ${entryAt(radio, 1).track.path}`,
      ])
    })

    it("leaves a paused player alone", async () => {
      const { radio } = makeRadio(LIBRARY)
      await radio.open()
      await radio.pause()

      await expect(radio.checkHealth()).resolves.toBe(false)
    })
  })

  describe("stop", () => {
    it("releases the player, speech, commentary and sinks", async () => {
      const sink = new MemorySink()
      const { radio, player, voice, commentary } = makeRadio(LIBRARY, { sinks: [sink] })
      await radio.open()

      await radio.stop()

      expect(player.closed).toBe(true)
      expect(voice.cancelled).toBe(1)
      expect(commentary.closed).toBe(true)
      expect(sink.closed).toBe(true)
      expect(radio.status().state).toBe("stopped")
      await expect(radio.skip()).resolves.toBeNull()
      await expect(radio.open()).rejects.toBeInstanceOf(RadioStateError)
    })
  })
})
