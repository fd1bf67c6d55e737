import { retryOnConflict } from '@application/common';
import { ConflictError, ProviderError } from '@application/errors';

describe('retryOnConflict', () => {
  it('should return the first successful result', async () => {
    const operation = jest.fn().mockResolvedValue('done');

    await expect(retryOnConflict(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should run the operation again after a conflict', async () => {
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new ConflictError('Conversation', 'conv_test'))
      .mockResolvedValueOnce('done');

    await expect(retryOnConflict(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should surface the conflict once attempts run out', async () => {
    const conflict = new ConflictError('Conversation', 'conv_test');
    const operation = jest.fn().mockRejectedValue(conflict);

    await expect(retryOnConflict(operation, 3)).rejects.toBe(conflict);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry other errors', async () => {
    const failure = new ProviderError('Anthropic', 'overloaded');
    const operation = jest.fn().mockRejectedValue(failure);

    await expect(retryOnConflict(operation)).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
