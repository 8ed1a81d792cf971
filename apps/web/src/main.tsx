import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import App from './App';
import { RiskCheckServicesProvider } from './hooks/useRiskCheckServices';
import { createAppServices } from './services/appServices';
import './styles.css';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element');
}

createRoot(container).render(
  <StrictMode>
    <RiskCheckServicesProvider services={createAppServices()}>
      <BrowserRouter>
        <App />
      </BrowserRouter>
    </RiskCheckServicesProvider>
  </StrictMode>,
);
