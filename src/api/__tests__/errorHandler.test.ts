import {
  AlreadyDeployedError,
  ChainTimeoutError,
  CurveArithmeticError,
  LaunchpadError,
  NetworkError,
  SlippageExceededError,
  StaleSequenceError,
  UnauthorizedCallerError,
  UnknownLaunchError,
  ValidationError
} from '../../types/errors';
import { statusFor } from '../middleware/errorHandler';

describe('statusFor', () => {
  const cases: Array<[LaunchpadError, number]> = [
    [new ValidationError('bad'), 400],
    [new SlippageExceededError('slipped', 10n, 5n), 400],
    [new UnauthorizedCallerError('0xabc'), 403],
    [new UnknownLaunchError('missing'), 404],
    [new AlreadyDeployedError('again'), 409],
    [new StaleSequenceError(1, 2), 409],
    [new CurveArithmeticError('overflow'), 422],
    [new NetworkError('down'), 502],
    [new ChainTimeoutError('slow'), 504]
  ];

  test.each(cases)('maps %s to %i', (error, status) => {
    expect(statusFor(error)).toBe(status);
  });
});
