import type { Hono } from "hono"
import { z } from "zod/mini"
import { createTestHarness } from "../../../../tests/test-harness"
import { Product } from "../../model/product.model"

const ProductPage = z.object({
  items: z.array(Product),
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
})

async function readPage(res: Response) {
  return ProductPage.parse(await res.json())
}

async function skusOf(res: Response): Promise<string[]> {
  const page = await readPage(res)
  return page.items.map((p) => p.sku)
}

describe("Products API", () => {
  let app: Hono

  beforeEach(async () => {
    const harness = await createTestHarness()
    app = harness.app
  })

  describe("GET /products", () => {
    it("returns the first page of everything without a query", async () => {
      const res = await app.request("/products")
      const page = await readPage(res)

      expect(res.status).toBe(200)
      expect(page.total).toBe(6)
      expect(page.limit).toBe(10)
      expect(page.offset).toBe(0)
      expect(page.items).toHaveLength(6)
    })

    it("filters by repeated tags", async () => {
      const res = await app.request("/products?tags=desk&tags=ergonomic")

      expect(await skusOf(res)).toEqual(["CHR-001", "TBL-001"])
    })

    it("combines name and price filters", async () => {
      const res = await app.request("/products?maxPrice=5000&name=lamp")

      expect(await skusOf(res)).toEqual(["LMP-001"])
    })

    it("percent-decodes values", async () => {
      const res = await app.request("/products?name=Desk+Lamp")

      expect(await skusOf(res)).toEqual(["LMP-001"])
    })

    it("reads pagination keys from the top level", async () => {
      const res = await app.request("/products?offset=1&limit=2")
      const page = await readPage(res)

      expect(page.items.map((p) => p.sku)).toEqual(["LMP-002", "CHR-001"])
      expect(page.total).toBe(6)
      expect(page.limit).toBe(2)
      expect(page.offset).toBe(1)
    })

    it("accepts a JSON list of skus under one key", async () => {
      const ids = encodeURIComponent('["MUG-001","RUG-001"]')

      const res = await app.request(`/products?ids=${ids}`)

      expect(await skusOf(res)).toEqual(["RUG-001", "MUG-001"])
    })

    it("rejects partial pagination", async () => {
      const res = await app.request("/products?limit=2")

      expect(res.status).toBe(400)
      expect(await res.json()).toStrictEqual({
        error: { status: 400, code: "no_value", message: "no value", requestId: "unknown" },
      })
    })

    it("rejects a non-numeric price with the caller's request id", async () => {
      const res = await app.request("/products?minPrice=abc", {
        headers: { "x-request-id": "req-42" },
      })

      expect(res.status).toBe(400)
      expect(await res.json()).toStrictEqual({
        error: {
          status: 400,
          code: "invalid_literal",
          message: "invalid u32 literal",
          requestId: "req-42",
        },
      })
    })

    it("ignores unknown keys by default", async () => {
      const res = await app.request("/products?color=red")

      expect(res.status).toBe(200)
    })
  })

  describe("with QUERY_STRICT", () => {
    it("rejects unknown keys", async () => {
      const harness = await createTestHarness({ env: { QUERY_STRICT: "true" } })

      const res = await harness.app.request("/products?color=red")

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({ error: { code: "unknown_field" } })
    })
  })

  describe("with QUERY_PERCENT_DECODE disabled", () => {
    it("matches the raw text", async () => {
      const harness = await createTestHarness({ env: { QUERY_PERCENT_DECODE: "false" } })

      const res = await harness.app.request("/products?name=Desk+Lamp")

      expect(await skusOf(res)).toEqual([])
    })
  })

  describe("POST /orders", () => {
    const post = (body: string) =>
      app.request("/orders", {
        method: "POST",
        body,
        headers: { "content-type": "application/x-www-form-urlencoded" },
      })

    it("answers with a form-encoded receipt", async () => {
      const res = await post("sku=LMP-001&qty=3&note=ring+twice")

      expect(res.status).toBe(201)
      expect(res.headers.get("content-type")).toBe("application/x-www-form-urlencoded")
      expect(await res.text()).toBe(
        "orderId=ord-1&sku=LMP-001&qty=3&totalCents=11997&note=ring+twice",
      )
    })

    it("answers 404 for an unknown sku", async () => {
      const res = await post("sku=NOPE-1&qty=1")

      expect(res.status).toBe(404)
    })

    it("rejects a negative quantity", async () => {
      const res = await post("sku=LMP-001&qty=-1")

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({
        error: { code: "invalid_literal", message: "invalid u16 literal" },
      })
    })
  })

  it("serves a welcome text at the root", async () => {
    const res = await app.request("/")

    expect(await res.text()).toBe("Welcome to catalog-api API")
  })
})
