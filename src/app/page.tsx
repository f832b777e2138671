import { redirect } from 'next/navigation';
import { getCurrentUser } from '@/src/lib/auth/currentUser.server';

export default async function Home() {
  const user = await getCurrentUser();
  redirect(user ? '/bowl' : '/login');
}
