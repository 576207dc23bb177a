import { GrowthDashboard } from '@/components/growth/growth-dashboard';

export default function Home() {
  return <GrowthDashboard />;
}
