import type {NextConfig} from 'next';

const nextConfig: NextConfig = {
  // PGlite loads its WASM and data files from beside its own sources.
  serverExternalPackages: ['@electric-sql/pglite'],
  async headers() {
    return [
      {
        source: '/(.*)',
        headers: [
          {
            key: 'Cache-Control',
            value: 'no-store'
          }
        ],
      },
    ];
  },
};

export default nextConfig;
