import { join } from 'node:path';
import { loadAppConfig } from '../../src/shared/config/app.config';

describe('loadAppConfig', () => {
  it('should default to the data directory and standard file names', () => {
    const config = loadAppConfig({});

    expect(config.port).toBe(3000);
    expect(config.dataDir).toBe('./data');
    expect(config.files).toEqual({
      customersFile: join('./data', 'customers.txt'),
      interactionsFile: join('./data', 'interactions.txt'),
    });
    expect(config.saveOnShutdown).toBe(true);
    expect(config.log).toEqual({ level: 'debug', pretty: true });
  });

  it('should place relative file names inside the data directory', () => {
    const config = loadAppConfig({
      CRM_DATA_DIR: '/srv/crm',
      CRM_CUSTOMERS_FILE: 'clients.txt',
      CRM_INTERACTIONS_FILE: '/var/lib/crm/log.txt',
    });

    expect(config.files.customersFile).toBe(join('/srv/crm', 'clients.txt'));
    expect(config.files.interactionsFile).toBe('/var/lib/crm/log.txt');
  });

  it('should pick log settings from the environment', () => {
    expect(loadAppConfig({ NODE_ENV: 'production' }).log).toEqual({
      level: 'info',
      pretty: false,
    });
    expect(loadAppConfig({ NODE_ENV: 'test' }).log).toEqual({
      level: 'silent',
      pretty: false,
    });
    expect(loadAppConfig({ LOG_LEVEL: 'WARN' }).log.level).toBe('warn');
    expect(loadAppConfig({ LOG_LEVEL: 'verbose' }).log.level).toBe('debug');
  });

  it('should parse port and shutdown flag', () => {
    const config = loadAppConfig({ PORT: '8080', CRM_SAVE_ON_SHUTDOWN: 'false' });

    expect(config.port).toBe(8080);
    expect(config.saveOnShutdown).toBe(false);
    expect(loadAppConfig({ PORT: 'abc' }).port).toBe(3000);
  });
});
