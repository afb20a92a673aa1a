import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { CliToolInvoker } from '../../../src/invoke/cli-invoker.js';
import { createInvoker } from '../../../src/invoke/factory.js';
import { SdkToolInvoker } from '../../../src/invoke/sdk-invoker.js';

describe('createInvoker', () => {
  it('uses the external client by default', () => {
    expect(createInvoker(DEFAULT_CONFIG, '/srv/youtrack-mcp')).toBeInstanceOf(CliToolInvoker);
  });

  it('connects through the SDK when the transport is sdk', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.cli.transport = 'sdk';
    expect(createInvoker(config, '/srv/youtrack-mcp')).toBeInstanceOf(SdkToolInvoker);
  });
});
