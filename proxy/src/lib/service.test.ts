import assert from "node:assert/strict";
import test from "node:test";
import { articleNode, createStubService, dataReply, edges, productNode } from "../testing/storefrontStub";
import { NotFoundError, UpstreamError } from "./errors";
import { FAQ_PAGE_LIMIT } from "./queries";

test("search sends one combined query limited per collection", async () => {
  const { service, stub } = createStubService(() =>
    dataReply({
      products: edges([productNode("shampoo-bar"), productNode("shampoo-refill"), productNode("shampoo-travel")]),
      articles: edges([articleNode("shampoo-guide")])
    })
  );

  const response = await service.search("shampoo", 2);

  assert.equal(stub.calls.length, 1);
  assert.deepEqual(stub.calls[0]?.variables, { query: "shampoo", first: 2 });
  assert.match(stub.calls[0]?.query ?? "", /products\(first: \$first, query: \$query\)/);
  assert.match(stub.calls[0]?.query ?? "", /articles\(first: \$first, query: \$query\)/);
  assert.equal(response.query, "shampoo");
  assert.deepEqual(
    response.results.map((result) => result.id),
    ["gid://shopify/Product/shampoo-bar", "gid://shopify/Product/shampoo-refill"]
  );
  assert.ok(response.results.every((result) => result.score === 1));
});

test("search defaults to five results", async () => {
  const { service, stub } = createStubService(() => dataReply({ products: edges([]), articles: edges([]) }));

  const response = await service.search("nothing");

  assert.deepEqual(stub.calls[0]?.variables, { query: "nothing", first: 5 });
  assert.deepEqual(response, { query: "nothing", results: [] });
});

test("product lookup by unknown handle is not found", async () => {
  const { service, stub } = createStubService(() => dataReply({ product: null }));

  await assert.rejects(service.product("argan-oil"), (error: unknown) => {
    assert.ok(error instanceof NotFoundError);
    assert.equal(error.message, "Product not found by handle");
    return true;
  });
  assert.deepEqual(stub.calls[0]?.variables, { handle: "argan-oil" });
});

test("product lookup returns the flattened detail", async () => {
  const { service } = createStubService(() =>
    dataReply({ product: productNode("argan-oil", { images: edges([{ url: "https://cdn.example.com/1.jpg" }]) }) })
  );

  const detail = await service.product("argan-oil");
  assert.equal(detail.url, "https://example.myshopify.com/products/argan-oil");
  assert.deepEqual(detail.images, ["https://cdn.example.com/1.jpg"]);
  assert.equal(detail.price, "10.0");
});

test("article lookup filters by quoted handle", async () => {
  const { service, stub } = createStubService(() => dataReply({ articles: edges([articleNode("spring-launch")]) }));

  const article = await service.article("spring-launch");

  assert.deepEqual(stub.calls[0]?.variables, { query: 'handle:"spring-launch"' });
  assert.deepEqual(article, {
    title: "spring launch",
    url: "https://example.myshopify.com/blogs/journal/spring-launch",
    excerpt: "Excerpt of spring-launch",
    content: "Content of spring-launch"
  });
});

test("article lookup with no match is not found", async () => {
  const { service } = createStubService(() => dataReply({ articles: edges([]) }));
  await assert.rejects(service.article("missing"), { name: "NotFoundError", message: "Article not found by handle" });
});

test("faq maps pages and requests at most ten", async () => {
  const { service, stub } = createStubService(() =>
    dataReply({
      pages: edges([
        { title: "Shipping FAQ", body: "We ship in 2 days." },
        { title: "Returns FAQ", body: null }
      ])
    })
  );

  const response = await service.faq();

  assert.deepEqual(stub.calls[0]?.variables, { first: FAQ_PAGE_LIMIT });
  assert.deepEqual(response, {
    faqs: [
      { question: "Shipping FAQ", answer: "We ship in 2 days." },
      { question: "Returns FAQ", answer: "" }
    ]
  });
});

test("faq with no matching pages is an empty list", async () => {
  const { service } = createStubService(() => dataReply({ pages: edges([]) }));
  assert.deepEqual(await service.faq(), { faqs: [] });
});

test("GraphQL errors abort the handler without a partial body", async () => {
  const { service } = createStubService(() => ({
    body: { data: { products: edges([productNode("a")]), articles: edges([]) }, errors: [{ message: "boom" }] }
  }));

  await assert.rejects(service.search("a", 5), (error: unknown) => error instanceof UpstreamError);
});
