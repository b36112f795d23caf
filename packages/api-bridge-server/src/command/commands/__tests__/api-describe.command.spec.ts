import { Logger } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';

import { ApiDescribeCommand } from 'src/command/commands/api-describe.command';
import { ApiFetchService } from 'src/engine/core-modules/api-fetch/services/api-fetch.service';

const mockApiFetchService = {
  describe: jest.fn(),
};

const describeResult = {
  apiName: 'weather',
  endpointName: 'current',
  statusCode: 200,
  format: 'json',
  parseError: null,
  description: {
    type: 'map',
    size: 1,
    structure: { fields: ['temp'], fieldTypes: { temp: 'number' } },
    sample: { temp: 4 },
  },
};

describe('ApiDescribeCommand', () => {
  let command: ApiDescribeCommand;
  let writeSpy: jest.SpyInstance;

  const printedDocument = () => JSON.parse(String(writeSpy.mock.calls[0][0]));

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApiDescribeCommand,
        { provide: ApiFetchService, useValue: mockApiFetchService },
      ],
    }).compile();

    command = module.get<ApiDescribeCommand>(ApiDescribeCommand);
    writeSpy = jest
      .spyOn(process.stdout, 'write')
      .mockImplementation(() => true);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should print the description of the endpoint data', async () => {
    mockApiFetchService.describe.mockResolvedValue(describeResult);

    await command.run(['weather', 'current'], { params: '{"city":"Oslo"}' });

    expect(mockApiFetchService.describe).toHaveBeenCalledWith({
      apiName: 'weather',
      endpointName: 'current',
      params: { city: 'Oslo' },
    });
    expect(printedDocument()).toEqual({ status: 'success', ...describeResult });
  });

  it('should report malformed params', async () => {
    await command.run(['weather', 'current'], { params: '{city' });

    expect(mockApiFetchService.describe).not.toHaveBeenCalled();
    expect(printedDocument()).toMatchObject({
      status: 'error',
      code: 'INVALID_OPTION',
    });
    expect(process.exitCode).toBe(1);
  });
});
