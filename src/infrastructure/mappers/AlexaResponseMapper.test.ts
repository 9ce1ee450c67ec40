import { describe, it, expect } from 'vitest';
import { AlexaResponseMapper } from './AlexaResponseMapper.js';

describe('AlexaResponseMapper', () => {
  describe('mapEntities', () => {
    it('should map entities and skip incomplete ones', () => {
      const mapped = AlexaResponseMapper.mapEntities([
        { id: 'e1', displayName: 'Porch Light', description: 'light.porch via Home Assistant' },
        { id: 'e2', displayName: 'No description' },
        'garbage',
      ]);

      expect(mapped?.items).toEqual([
        {
          id: 'e1',
          displayName: 'Porch Light',
          description: 'light.porch via Home Assistant',
          haEntityId: 'light.porch',
          deleteId: 'light%23porch',
        },
      ]);
      expect(mapped?.skipped.map((s) => s.reason)).toEqual(['missing keys: description', 'not an object']);
    });

    it('should return null when the body is not an array', () => {
      expect(AlexaResponseMapper.mapEntities({ entities: [] })).toBeNull();
    });
  });

  describe('mapEndpoints', () => {
    it('should read the legacy appliance of each endpoint', () => {
      const mapped = AlexaResponseMapper.mapEndpoints({
        data: {
          endpoints: {
            items: [
              {
                friendlyName: 'Desk Lamp',
                legacyAppliance: {
                  applianceId: 'SKILL_abc==_light#desk_lamp',
                  applianceKey: 'key-1',
                  friendlyDescription: 'light.desk_lamp via Home Assistant',
                  manufacturerName: 'Home Assistant',
                },
              },
              { friendlyName: 'Echo', legacyAppliance: null },
            ],
          },
        },
      });

      expect(mapped?.items).toEqual([
        {
          id: 'key-1',
          displayName: 'Desk Lamp',
          description: 'light.desk_lamp via Home Assistant',
          haEntityId: 'light.desk_lamp',
          deleteId: 'light%23desk_lamp',
          applianceId: 'SKILL_abc==_light#desk_lamp',
          manufacturerName: 'Home Assistant',
        },
      ]);
      expect(mapped?.skipped).toHaveLength(1);
    });

    it('should return null when the items are missing', () => {
      expect(AlexaResponseMapper.mapEndpoints({ data: { endpoints: null } })).toBeNull();
      expect(AlexaResponseMapper.mapEndpoints([])).toBeNull();
    });
  });

  describe('mapGroups', () => {
    it('should carry every group field and default the missing ones', () => {
      const mapped = AlexaResponseMapper.mapGroups({
        applianceGroups: [
          {
            name: 'Kitchen',
            groupId: 'g-1',
            entityId: 'ent-1',
            applianceIds: ['SKILL_abc==_light#kitchen', { applianceId: 'SKILL_abc==_switch#kettle' }],
            defaultMetadataByType: { LIGHT: { id: 'x' } },
          },
          { groupId: 'g-2' },
        ],
      });

      expect(mapped?.items).toEqual([
        {
          id: 'g-1',
          name: 'Kitchen',
          entityId: 'ent-1',
          entityType: 'GROUP',
          groupType: 'APPLIANCE',
          childIds: [],
          defaults: [],
          associatedUnitIds: [],
          defaultMetadataByType: { LIGHT: { id: 'x' } },
          implicitTargetingByType: {},
          applianceIds: ['SKILL_abc==_light#kitchen', 'SKILL_abc==_switch#kettle'],
        },
      ]);
      expect(mapped?.skipped.map((s) => s.reason)).toEqual(['missing name or groupId']);
    });

    it('should return null without applianceGroups', () => {
      expect(AlexaResponseMapper.mapGroups({})).toBeNull();
    });
  });
});
