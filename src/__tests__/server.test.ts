/**
 * Integration tests for the MCP server using InMemoryTransport
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, ErrorCode, McpError, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { IdenticonServer } from '../server.js';

function parseText(result: CallToolResult): unknown {
    expect(result.content).toHaveLength(1);
    const [first] = result.content;
    expect(first.type).toBe('text');
    return JSON.parse(first.type === 'text' ? first.text : '');
}

describe('IdenticonServer', () => {
    let client: Client;
    let serverTransport: InMemoryTransport;
    let clientTransport: InMemoryTransport;
    let dir: string;
    let server: IdenticonServer;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'identicon-mcp-'));
        [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

        server = new IdenticonServer();
        await server.run(serverTransport);

        client = new Client(
            {
                name: 'test-client',
                version: '1.0.0',
            },
            {
                capabilities: {},
            }
        );
        await client.connect(clientTransport);
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await client.close();
        await serverTransport.close();
        await rm(dir, { recursive: true, force: true });
    });

    it('should expose the connected client through the underlying server', () => {
        expect(server.getServer().getClientVersion()).toEqual({ name: 'test-client', version: '1.0.0' });
    });

    it('should start when ENABLE_PERF_LOGS holds a value other than "1"', async () => {
        vi.stubEnv('ENABLE_PERF_LOGS', 'yes');
        expect(() => new IdenticonServer()).not.toThrow();

        const result = (await client.callTool({ name: 'health', arguments: {} }, CallToolResultSchema)) as CallToolResult;
        expect(parseText(result)).toMatchObject({ ok: true, toolCount: 3 });
    });

    it('should list every tool', async () => {
        const { tools } = await client.listTools();
        expect(tools.map((tool) => tool.name)).toEqual(['health', 'generate_identicon', 'render_identicon']);
    });

    it('should generate an identicon file', async () => {
        const result = (await client.callTool(
            { name: 'generate_identicon', arguments: { input: 'example', outputDir: dir } },
            CallToolResultSchema
        )) as CallToolResult;

        expect(parseText(result)).toEqual({
            ok: true,
            path: join(dir, 'example.png'),
            hex: [26, 121, 164, 214, 13, 230, 113, 142, 142, 91, 50, 110, 51, 138, 229, 51],
            color: { r: 26, g: 121, b: 164 },
            colorHex: '#1A79A4',
            cellCount: 14,
        });
        expect((await stat(join(dir, 'example.png'))).size).toBeGreaterThan(0);
    });

    it('should report a failed write as ok: false', async () => {
        const result = (await client.callTool(
            { name: 'generate_identicon', arguments: { input: 'example', outputDir: join(dir, 'missing') } },
            CallToolResultSchema
        )) as CallToolResult;

        expect(parseText(result)).toMatchObject({ ok: false });
    });

    it('should render without writing a file', async () => {
        const result = (await client.callTool(
            { name: 'render_identicon', arguments: { input: 'example' } },
            CallToolResultSchema
        )) as CallToolResult;

        expect(parseText(result)).toMatchObject({
            ok: true,
            colorHex: '#1A79A4',
            pixelMap: expect.arrayContaining([{ topLeft: { x: 150, y: 200 }, bottomRight: { x: 200, y: 250 } }]),
        });
    });

    it('should answer health checks', async () => {
        const result = (await client.callTool({ name: 'health', arguments: {} }, CallToolResultSchema)) as CallToolResult;
        expect(parseText(result)).toMatchObject({ ok: true, toolCount: 3 });
    });

    it('should reject missing input with InvalidParams', async () => {
        const call = client.callTool({ name: 'render_identicon', arguments: {} }, CallToolResultSchema);
        await expect(call).rejects.toBeInstanceOf(McpError);
        await expect(
            client.callTool({ name: 'render_identicon', arguments: {} }, CallToolResultSchema)
        ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('should reject unknown tools with MethodNotFound', async () => {
        await expect(
            client.callTool({ name: 'draw_unicorn', arguments: {} }, CallToolResultSchema)
        ).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    });
});
