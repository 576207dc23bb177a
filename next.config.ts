import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // The Azure SDK stays a runtime require on the server instead of being bundled
  serverExternalPackages: ['@azure/storage-blob'],
};

export default nextConfig;
