/**
 * Not Found Page
 *
 * WHAT: Catch-all route for paths other than the demo.
 */

import { Link } from 'react-router-dom';

function NotFound() {
  return (
    <main className="mx-auto flex min-h-screen max-w-md flex-col justify-center px-4">
      <div className="rounded-lg bg-white px-6 py-8 text-center shadow">
        <h1 className="text-2xl font-bold tracking-tight text-gray-900">Page not found</h1>
        <p className="mt-3 text-sm text-gray-600">
          This app only has one screen: the loading overlay demo.
        </p>
        <Link to="/" className="btn-primary mt-6">
          Back to the demo
        </Link>
      </div>
    </main>
  );
}

export default NotFound;
