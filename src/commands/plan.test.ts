// Path: src/commands/plan.test.ts

import { describe, it, expect } from 'vitest';
import { formatPlan, summarizePlan } from './plan.js';
import { planSupervision } from '../services/supervisor/plan.js';

describe('summarizePlan', () => {
  it('should list children in start order with masked URLs', () => {
    const plan = planSupervision({
      name: 'orders',
      host: 'broker:8080',
      transportOptions: { authToken: 'test-secret' },
      producer: { tenant: 't', namespace: 'n', topic: 'top', query: { token: 'test-secret' } },
      reader: { tenant: 't', namespace: 'n', topic: 'top' },
    });

    expect(summarizePlan(plan)).toEqual({
      name: 'orders',
      supervisor: 'orders-supervisor',
      registry: 'orders-registry',
      host: 'broker:8080',
      protocol: 'ws',
      children: [
        { id: 'registry', kind: 'registry' },
        {
          id: 'producer',
          kind: 'connection',
          role: 'producer',
          url: 'ws://broker:8080/ws/v2/producer/persistent/t/n/top?token=***',
        },
        {
          id: 'reader',
          kind: 'connection',
          role: 'reader',
          url: 'ws://broker:8080/ws/v2/reader/persistent/t/n/top',
        },
      ],
    });
  });
});

describe('formatPlan', () => {
  it('should number children and show their URLs', () => {
    const output = formatPlan(summarizePlan(planSupervision({
      host: 'broker:8080',
      producer: { tenant: 't', namespace: 'n', topic: 'top' },
    })));

    expect(output).toContain('default-supervisor');
    expect(output).toContain('ws://broker:8080/ws/v2/producer/persistent/t/n/top');
    expect(output.split('\n')).toHaveLength(7);
  });
});
