export type MdnsServiceRecord = {
  name?: string;
  host?: string;
  port: number;
  addresses?: string[];
  txt?: Record<string, unknown>;
  type?: string;
  protocol?: string;
};

export type MdnsBrowseOptions = {
  type: string;
  protocol?: 'tcp' | 'udp';
};

export type MdnsBrowser = {
  stop: () => void;
};

export interface MdnsPort {
  browse: (options: MdnsBrowseOptions, onService: (service: MdnsServiceRecord) => void) => MdnsBrowser;
  shutdown: () => void;
}
