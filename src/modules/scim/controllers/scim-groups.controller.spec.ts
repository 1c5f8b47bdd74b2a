import { Test, TestingModule } from '@nestjs/testing';
import type { Request } from 'express';

import type { GroupRecord } from '../../../domain/models/group.model';
import { DirectoryFacade } from '../../directory/directory.facade';
import { ScimGroupsController } from './scim-groups.controller';

describe('ScimGroupsController', () => {
  let controller: ScimGroupsController;

  const created = new Date('2024-01-01T00:00:00.000Z');
  const eng: GroupRecord = {
    id: 'group-1',
    displayName: 'Eng',
    members: [{ value: 'user-1', display: 'alice', type: 'User' }],
    meta: { resourceType: 'Group', created, lastModified: created },
  };

  const mockRequest = {
    protocol: 'https',
    headers: { 'x-forwarded-host': 'idp.example.test' },
    get: jest.fn(() => 'internal:3000'),
  } as unknown as Request;

  const mockDirectory = {
    createGroup: jest.fn(),
    getGroup: jest.fn(),
    listGroups: jest.fn(),
    replaceGroup: jest.fn(),
    patchGroup: jest.fn(),
    deleteGroup: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ScimGroupsController],
      providers: [{ provide: DirectoryFacade, useValue: mockDirectory }],
    }).compile();

    controller = module.get<ScimGroupsController>(ScimGroupsController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should drop null externalId and members on create', async () => {
    mockDirectory.createGroup.mockResolvedValue(eng);

    await controller.createGroup('v2', { displayName: 'Eng', externalId: null, members: null }, mockRequest);

    expect(mockDirectory.createGroup).toHaveBeenCalledWith({ displayName: 'Eng' });
  });

  it('should pass member references through on replace', async () => {
    mockDirectory.replaceGroup.mockResolvedValue(eng);

    await controller.replaceGroup(
      'v1',
      'group-1',
      { displayName: 'Eng', externalId: 'ext-1', members: [{ value: 'user-1' }] },
      mockRequest,
    );

    expect(mockDirectory.replaceGroup).toHaveBeenCalledWith('group-1', {
      displayName: 'Eng',
      externalId: 'ext-1',
      members: [{ value: 'user-1' }],
    });
  });

  it('should render members and a location built from forwarded headers', async () => {
    mockDirectory.getGroup.mockResolvedValue(eng);

    const result = await controller.getGroup('v1', 'group-1', mockRequest);

    expect(result.schemas).toEqual(['urn:scim:schemas:core:1.0']);
    expect(result.members).toEqual([{ value: 'user-1', display: 'alice', type: 'User' }]);
    expect(result.meta.location).toBe('https://idp.example.test/scim/v1/Groups/group-1');
  });

  it('should tag patches by dialect', async () => {
    mockDirectory.patchGroup.mockResolvedValue(eng);
    const legacy = { members: [{ value: 'user-1', operation: 'delete' }] };
    const current = { Operations: [{ op: 'add', path: 'members', value: [{ value: 'user-1' }] }] };

    await controller.patchGroup('v1', 'group-1', legacy, mockRequest);
    await controller.patchGroup('v2', 'group-1', current, mockRequest);

    expect(mockDirectory.patchGroup).toHaveBeenNthCalledWith(1, {
      kind: 'legacy-group',
      groupId: 'group-1',
      body: legacy,
    });
    expect(mockDirectory.patchGroup).toHaveBeenNthCalledWith(2, {
      kind: 'current-group',
      groupId: 'group-1',
      body: current,
    });
  });

  it('should echo the requested window in list responses', async () => {
    mockDirectory.listGroups.mockResolvedValue({ resources: [eng], total: 3 });

    const result = await controller.listGroups('v2', { startIndex: 2, count: 1, filter: 'displayName eq "Eng"' }, mockRequest);

    expect(mockDirectory.listGroups).toHaveBeenCalledWith({ startIndex: 2, count: 1, filter: 'displayName eq "Eng"' });
    expect(result).toMatchObject({
      schemas: ['urn:ietf:params:scim:api:messages:2.0:ListResponse'],
      totalResults: 3,
      startIndex: 2,
      itemsPerPage: 1,
    });
  });
});
