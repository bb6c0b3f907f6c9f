import { BrowserLauncher } from '../BrowserLauncher';
import { createLogger } from '../../services/LoggingService';
import open from 'open';
import { ChildProcess } from 'child_process';

// Mock the open package
jest.mock('open');

describe('BrowserLauncher', () => {
  const mockOpen = jest.mocked(open);
  let launcher: BrowserLauncher;

  beforeEach(() => {
    launcher = new BrowserLauncher(createLogger('BrowserLauncherTest', { silent: true }));
    jest.clearAllMocks();
  });

  it('should open browser with provided URL', async () => {
    mockOpen.mockResolvedValue(new ChildProcess());

    await expect(launcher.open('http://localhost:8080')).resolves.toBe(true);

    expect(mockOpen).toHaveBeenCalledWith('http://localhost:8080');
  });

  it('should report failure without throwing', async () => {
    mockOpen.mockRejectedValue(new Error('Browser not found'));

    await expect(launcher.open('http://localhost:8080')).resolves.toBe(false);
  });
});
