import { DEFAULT_PORT, NEVER_UPDATED, type BlockColors, type DashboardConfig } from './schema';

const SINGLE_COLORS: BlockColors = {
  background: '#fff',
  title_color: '#333',
  title_background: '#eee',
  title_font_size: '1.2em',
  value_font_size: '1em'
};

const GROUP_COLORS: BlockColors = {
  background: '#f9f9f9',
  title_color: '#0056b3',
  title_background: '#e0f2f7',
  title_font_size: '1.2em',
  label_color: '#555',
  label_background: '#f0f0f0',
  label_font_size: '1em',
  value_color: '#222',
  value_background: '#fff',
  value_font_size: '1em'
};

// Written on first start when no config.json exists yet.
export const createDefaultConfig = (now: Date = new Date()): DashboardConfig => ({
  blocks: [
    {
      type: 'single',
      title: 'Uptime',
      command: 'uptime',
      interval: 5,
      output: '',
      last_updated: NEVER_UPDATED,
      colors: { ...SINGLE_COLORS }
    },
    {
      type: 'single',
      title: 'Disk Usage',
      command: 'df -h',
      interval: 10,
      output: '',
      last_updated: NEVER_UPDATED,
      colors: { ...SINGLE_COLORS }
    },
    {
      type: 'group',
      title: 'System Info',
      commands: [
        { label: 'Hostname', command: '%hostname', output: '' },
        { label: 'Current Time', command: '%time', output: '' },
        { label: 'Current Date', command: '%date', output: '' },
        { label: 'Username', command: '%username', output: '' },
        { label: 'IP Address', command: '%ip_address', output: '' }
      ],
      interval: 5,
      last_updated: NEVER_UPDATED,
      colors: { ...GROUP_COLORS }
    }
  ],
  last_updated: now.toISOString(),
  port: DEFAULT_PORT,
  version: '',
  colors: { page_background: '#f0f0f0' }
});
