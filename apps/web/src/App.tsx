import { Navigate, Route, Routes } from 'react-router-dom';
import RootLayout from './components/RootLayout';
import DashboardPage from './pages/DashboardPage';
import CustomerDetailPage from './pages/customerDetail/CustomerDetailPage';

const App = () => {
  return (
    <RootLayout>
      <Routes>
        <Route path="/" element={<DashboardPage />} />
        <Route path="/customers/:customerId/:traceId" element={<CustomerDetailPage />} />
        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
    </RootLayout>
  );
};

export default App;
