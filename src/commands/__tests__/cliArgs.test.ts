/**
 * Unit tests for command-line argument parsing
 */

import { parseArgs } from '../cliArgs';

describe('parseArgs', () => {
  it('should default to a simulation of every instance', () => {
    expect(parseArgs([])).toEqual({ mode: 'simulate', parameters: {}, debug: false });
  });

  it('should read every option', () => {
    const args = parseArgs([
      '--mode=paper',
      '--instance=SAMPLE_CHASE_V1',
      '--file=data/other.csv',
      '--param=gap=2',
      '--param=mode_chase=safety',
      '--iterations=3',
      '--debug',
    ]);

    expect(args).toEqual({
      mode: 'paper',
      instanceId: 'SAMPLE_CHASE_V1',
      file: 'data/other.csv',
      parameters: { gap: '2', mode_chase: 'safety' },
      iterations: 3,
      debug: true,
    });
  });

  it('should keep everything after the first "=" of a parameter as its value', () => {
    expect(parseArgs(['--param=note=a=b']).parameters).toEqual({ note: 'a=b' });
  });

  it('should reject unknown modes and arguments', () => {
    expect(() => parseArgs(['--mode=live'])).toThrow('Unknown mode "live". Use --mode=simulate or --mode=paper');
    expect(() => parseArgs(['--fast'])).toThrow('Unknown argument "--fast"');
  });

  it('should reject malformed parameters and iteration counts', () => {
    expect(() => parseArgs(['--param=gap'])).toThrow('Invalid --param "gap", expected key=value');
    expect(() => parseArgs(['--param==2'])).toThrow('Invalid --param "=2", expected key=value');
    expect(() => parseArgs(['--iterations=0'])).toThrow('Invalid --iterations "0"');
    expect(() => parseArgs(['--iterations=2.5'])).toThrow('Invalid --iterations "2.5"');
  });
});
