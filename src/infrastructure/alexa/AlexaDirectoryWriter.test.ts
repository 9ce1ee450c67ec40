import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { AlexaDirectoryWriter } from './AlexaDirectoryWriter.js';
import { AlexaEndpoints } from './AlexaEndpoints.js';
import { MutationExecutor } from '../../application/MutationExecutor.js';
import type { ITransport, TransportRequest, TransportResponse } from '../../domain/ports/ITransport.js';
import type { IClock } from '../../domain/ports/IClock.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { createAlexaEntity } from '../../domain/entities/AlexaEntity.js';
import { buildCreateGroupPayload, buildUpdateGroupPayload } from '../../domain/entities/ApplianceGroup.js';

describe('AlexaDirectoryWriter', () => {
  let send: Mock<(request: TransportRequest) => Promise<TransportResponse>>;
  let mockTransport: ITransport;
  let mockClock: IClock;
  let mockLogger: ILogger;

  const endpoints = new AlexaEndpoints({
    host: 'alexa.test',
    cookie: 'test-cookie',
    csrf: 'test-csrf',
    appHeader: 'test-app',
    deleteSkill: 'SKILL_test',
    userAgent: 'test-agent',
    routineVersion: '1.0',
  });

  beforeEach(() => {
    send = vi.fn<(request: TransportRequest) => Promise<TransportResponse>>();
    mockTransport = { send };
    mockClock = { now: vi.fn().mockReturnValue(0), sleep: vi.fn().mockResolvedValue(undefined) };
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
  });

  function writer(dryRun = false): AlexaDirectoryWriter {
    const executor = new MutationExecutor(mockTransport, mockClock, { dryRun, doNotDelete: false }, mockLogger);
    return new AlexaDirectoryWriter(endpoints, executor);
  }

  it('should delete an entity through the appliance endpoint and verify it is gone', async () => {
    send.mockResolvedValueOnce({ statusCode: 200, bodyText: '' }).mockResolvedValueOnce({ statusCode: 404, bodyText: '' });
    const entity = createAlexaEntity({ id: 'e1', displayName: 'Porch', description: 'light.porch via Home Assistant' });

    const result = await writer().deleteEntity(entity);

    expect(result.ok).toBe(true);
    const [deleteRequest, checkRequest] = send.mock.calls.map(([request]) => request);
    expect(deleteRequest?.method).toBe('DELETE');
    expect(deleteRequest?.url).toBe('https://alexa.test/api/phoenix/appliance/SKILL_test%3D%3D_light%23porch');
    expect(deleteRequest?.timeoutMs).toBe(10000);
    expect(checkRequest?.method).toBe('GET');
    expect(checkRequest?.url).toBe('https://alexa.test/api/smarthome/v1/presentation/devices/control/e1');
  });

  it('should post new groups with every field in a fixed order', async () => {
    send.mockResolvedValue({ statusCode: 200, bodyText: '{}' });

    await writer().createGroup(buildCreateGroupPayload('Kitchen', ['a']));

    const request = send.mock.calls[0]?.[0];
    expect(request?.method).toBe('POST');
    expect(request?.url).toBe('https://alexa.test/api/phoenix/group');
    expect(request?.body).toBe(
      '{"entityId":"","id":"","name":"Kitchen","entityType":"GROUP","groupType":"APPLIANCE","childIds":[],' +
        '"defaults":[],"associatedUnitIds":[],"defaultMetadataByType":{},"implicitTargetingByType":{},' +
        '"applianceIds":["a"]}'
    );
  });

  it('should put group updates to the group url', async () => {
    send.mockResolvedValue({ statusCode: 200, bodyText: '' });
    const group = { ...buildCreateGroupPayload('Kitchen', ['a']), id: 'g1', entityId: 'ent-1' };

    await writer().updateGroup(buildUpdateGroupPayload(group, ['a', 'b']));

    const request = send.mock.calls[0]?.[0];
    expect(request?.method).toBe('PUT');
    expect(request?.url).toBe('https://alexa.test/api/phoenix/group/g1');
    expect(request?.timeoutMs).toBe(15000);
  });

  it('should check the group url after deleting a group', async () => {
    send.mockResolvedValueOnce({ statusCode: 204, bodyText: '' }).mockResolvedValueOnce({ statusCode: 404, bodyText: '' });
    const group = { ...buildCreateGroupPayload('Kitchen', []), id: 'g1', entityId: 'ent-1' };

    const result = await writer().deleteGroup(group);

    expect(result.ok).toBe(true);
    expect(send.mock.calls.map(([request]) => `${request.method} ${request.url}`)).toEqual([
      'DELETE https://alexa.test/api/phoenix/group/g1',
      'GET https://alexa.test/api/phoenix/group/g1',
    ]);
  });

  it('should send nothing in dry-run', async () => {
    const result = await writer(true).createGroup(buildCreateGroupPayload('Kitchen', []));

    expect(result).toEqual({ ok: true, simulated: true, suppressed: false, attempts: 0 });
    expect(send).not.toHaveBeenCalled();
  });
});
