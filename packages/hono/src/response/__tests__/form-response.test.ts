import { q } from "@flatquery/codec"
import { Hono } from "hono"
import { FORM_CONTENT_TYPE, formResponse } from "../form-response"

const result = q.record({
  name: q.string(),
  ids: q.seq(q.u32()),
  next: q.optional(q.u32()),
})

describe("formResponse", () => {
  it("encodes the value as a form body", async () => {
    const app = new Hono()
    app.get("/result", (c) => formResponse(c, result, { name: "desk lamp & shade", ids: [1, 2] }))

    const res = await app.request("/result")

    expect(res.status).toBe(200)
    expect(res.headers.get("content-type")).toBe(FORM_CONTENT_TYPE)
    expect(await res.text()).toBe("name=desk+lamp+%26+shade&ids=1&ids=2")
  })

  it("uses the given status", async () => {
    const app = new Hono()
    app.post("/result", (c) => formResponse(c, result, { name: "a", ids: [], next: 3 }, 201))

    const res = await app.request("/result", { method: "POST" })

    expect(res.status).toBe(201)
    expect(await res.text()).toBe("name=a&next=3")
  })

  it("honours a caller encodeComponent", async () => {
    const app = new Hono()
    app.get("/result", (c) =>
      formResponse(c, result, { name: "a b", ids: [] }, 200, { encodeComponent: (raw) => raw }),
    )

    const res = await app.request("/result")

    expect(await res.text()).toBe("name=a b")
  })

  it("lets encoding failures reach the app error handler", async () => {
    const app = new Hono()
    app.onError((err, c) => c.text(err.message, 500))
    app.get("/result", (c) => formResponse(c, result, { name: "a", ids: [-1] }))

    const res = await app.request("/result")

    expect(res.status).toBe(500)
    expect(await res.text()).toBe("invalid u32 value")
  })
})
