import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { HomeAssistantRestClient, AREAS_TEMPLATE } from './HomeAssistantRestClient.js';
import type { ITransport, TransportRequest, TransportResponse } from '../../domain/ports/ITransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { DirectoryReadError } from '../../domain/errors/SyncError.js';

describe('HomeAssistantRestClient', () => {
  let send: Mock<(request: TransportRequest) => Promise<TransportResponse>>;
  let mockTransport: ITransport;
  let mockLogger: ILogger;
  let client: HomeAssistantRestClient;

  beforeEach(() => {
    send = vi.fn<(request: TransportRequest) => Promise<TransportResponse>>();
    mockTransport = { send };
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
    client = new HomeAssistantRestClient(
      { url: 'http://ha.test:8123/', accessToken: 'test-token' },
      mockTransport,
      mockLogger
    );
  });

  describe('getAreas', () => {
    it('should render the area template and repair the answer', async () => {
      send.mockResolvedValue({
        statusCode: 200,
        bodyText: '"Kitchen":["light.kitchen","switch.kettle"], "Garage":[],',
      });

      const areas = await client.getAreas();

      expect(areas).toEqual({ Kitchen: ['light.kitchen', 'switch.kettle'], Garage: [] });
      const request = send.mock.calls[0]?.[0];
      expect(request?.method).toBe('POST');
      expect(request?.url).toBe('http://ha.test:8123/api/template');
      expect(request?.headers['Authorization']).toBe('Bearer test-token');
      expect(request?.body).toBe(JSON.stringify({ template: AREAS_TEMPLATE }));
    });

    it('should resolve with no areas when the answer cannot be parsed', async () => {
      send.mockResolvedValue({ statusCode: 200, bodyText: 'TemplateError: boom' });

      await expect(client.getAreas()).resolves.toEqual({});
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Could not parse Home Assistant areas',
        expect.any(SyntaxError),
        { bodyPreview: 'TemplateError: boom' }
      );
    });

    it('should drop areas whose entity list is not an array', async () => {
      send.mockResolvedValue({ statusCode: 200, bodyText: '{"Kitchen":["light.a", 3],"Broken":"x"}' });

      await expect(client.getAreas()).resolves.toEqual({ Kitchen: ['light.a'] });
    });

    it('should reject when the template endpoint fails', async () => {
      send.mockResolvedValue({ statusCode: 401, bodyText: '401: Unauthorized' });

      await expect(client.getAreas()).rejects.toBeInstanceOf(DirectoryReadError);
    });
  });

  describe('getLastCalledDevice', () => {
    it('should return the rendered entity id', async () => {
      send.mockResolvedValue({ statusCode: 200, bodyText: ' media_player.kitchen_echo\n' });

      await expect(client.getLastCalledDevice()).resolves.toBe('media_player.kitchen_echo');
    });

    it('should return null when nothing was called', async () => {
      send.mockResolvedValue({ statusCode: 200, bodyText: '' });

      await expect(client.getLastCalledDevice()).resolves.toBeNull();
    });
  });

  describe('triggerDiscovery', () => {
    it('should ask the Echo to discover devices', async () => {
      send.mockResolvedValue({ statusCode: 200, bodyText: '[]' });

      await expect(client.triggerDiscovery('media_player.kitchen_echo')).resolves.toBe(true);
      const request = send.mock.calls[0]?.[0];
      expect(request?.url).toBe('http://ha.test:8123/api/services/media_player/play_media');
      expect(request?.body).toBe(
        JSON.stringify({
          entity_id: 'media_player.kitchen_echo',
          media_content_id: 'discover devices',
          media_content_type: 'custom',
        })
      );
    });

    it('should report a rejected service call', async () => {
      send.mockResolvedValue({ statusCode: 400, bodyText: '' });

      await expect(client.triggerDiscovery('media_player.kitchen_echo')).resolves.toBe(false);
    });
  });
});
