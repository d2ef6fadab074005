import { Writable } from "node:stream"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { requestId: "r-1" },
    )

    logger.info("decoded query", { op: "decode", fields: 3 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "decoded query",
      requestId: "r-1",
      op: "decode",
      fields: 3,
    })

    expect(typeof payload.time).toBe("number")
    expect(typeof payload.level).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { requestId: "r-1" },
    )
    const child = base.child({ op: "encode" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "logged",
      requestId: "r-1",
      op: "encode",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("invalid i32 literal", { cause: new SyntaxError("bad digits") })

    logger.error("decode failed", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.type).toBe("Error")
    expect(payload.err.message).toBe("invalid i32 literal")
    expect(payload.err.cause).toMatchObject({ type: "SyntaxError", message: "bad digits" })
  })
})
