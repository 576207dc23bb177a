import type { Metadata } from 'next';
import './globals.css';

export const metadata: Metadata = {
  title: 'Baby Growth Tracker',
  description: 'Infant weight measurements against WHO growth percentiles',
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="antialiased">{children}</body>
    </html>
  );
}
