import dns from 'node:dns';
import { Agent, type Dispatcher } from 'undici';

dns.setDefaultResultOrder('ipv4first'); // avoid IPv6 stalls on some hosts

let _agent: Agent | null = null;

/** Shared keep-alive agent for outbound HTTP calls. */
export function getHttpAgent(): Dispatcher {
    if (!_agent) _agent = new Agent({ keepAliveTimeout: 10_000, keepAliveMaxTimeout: 15_000 });
    return _agent;
}

export async function closeHttpAgent() {
    if (_agent) {
        const agent = _agent;
        _agent = null;
        await agent.close();
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
