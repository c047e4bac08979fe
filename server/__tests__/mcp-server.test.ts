import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MCP_SERVER_NAME, createMcpServer } from "../mcp-server.js";
import { propertyFixture, testServices } from "./helpers/fakes.js";

describe("MCP server", () => {
  let client: Client;

  beforeEach(async () => {
    const server = createMcpServer(testServices().dispatcher);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it("identifies itself", () => {
    expect(client.getServerVersion()).toMatchObject({ name: MCP_SERVER_NAME, version: "1.0.0" });
  });

  it("lists the tools with their input schemas", async () => {
    const { tools } = await client.listTools();

    expect(tools).toHaveLength(10);
    expect(tools.find((tool) => tool.name === "estimate_sale_price")).toMatchObject({
      inputSchema: { type: "object" },
    });
  });

  it("returns tool output as text content", async () => {
    const result = await client.callTool({
      name: "register_property",
      arguments: { property_data: propertyFixture() },
    });

    expect(result).toMatchObject({
      content: [{ type: "text", text: "✅ Registered property 'Test Mansion' (ID: p1)." }],
    });
    expect(result.isError).toBeFalsy();
  });

  it("returns input errors as text", async () => {
    const result = await client.callTool({ name: "analyze_property", arguments: { purchase_price: 20_000_000 } });

    expect(result).toMatchObject({ content: [{ type: "text", text: "Input error: monthly_rent is required" }] });
  });

  it("flags unknown tools as errors", async () => {
    const result = await client.callTool({ name: "nope", arguments: {} });

    expect(result).toMatchObject({ isError: true, content: [{ type: "text", text: "Unknown tool: nope" }] });
  });

  it("lists and reads registered properties as resources", async () => {
    await client.callTool({ name: "register_property", arguments: { property_data: propertyFixture() } });

    const { resources } = await client.listResources();
    expect(resources.map((resource) => resource.uri)).toEqual(["property://local.host/p1"]);

    const { contents } = await client.readResource({ uri: "property://local.host/p1" });
    expect(contents).toHaveLength(1);
    expect(contents[0]).toMatchObject({ uri: "property://local.host/p1", mimeType: "application/json" });
  });

  it("fails reads of unknown resources", async () => {
    await expect(client.readResource({ uri: "property://local.host/ghost" })).rejects.toThrow(/Property not found: ghost/);
  });
});
