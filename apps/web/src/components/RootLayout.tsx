import type { PropsWithChildren } from 'react';
import { Link } from 'react-router-dom';

const RootLayout = ({ children }: PropsWithChildren) => {
  return (
    <div className="app-shell">
      <header className="app-header">
        <div>
          <h1>
            <Link to="/" className="logo-link">
              KYB Dashboard
            </Link>
          </h1>
          <p className="app-subtitle">Business customer risk checks</p>
        </div>
        <div className="app-header-actions">
          <span className="greeting">Hi, User</span>
        </div>
      </header>
      <main>{children}</main>
    </div>
  );
};

export default RootLayout;
