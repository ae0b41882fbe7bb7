declare module 'bitcoin-core' {
  interface BitcoinCoreOptions {
    host?: string;
    port?: number;
    username?: string;
    password?: string;
    wallet?: string;
  }

  // Entry of the client's RPC method table; `multiwallet` decides whether a call goes to /wallet/<name>.
  interface MethodSpec {
    features?: Record<string, { supported?: boolean } | undefined>;
    supported?: boolean;
  }

  export default class BitcoinCore {
    constructor(options: BitcoinCoreOptions);
    methods: Record<string, MethodSpec | undefined>;
    command(method: string, ...params: unknown[]): Promise<unknown>;
  }
}
