import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // Service is API-only; route handlers run on the Node.js runtime
  typescript: {
    ignoreBuildErrors: false,
  },
};

export default nextConfig;
