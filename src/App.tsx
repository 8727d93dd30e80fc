import { BrowserRouter, Navigate, Route, Routes } from "react-router-dom";
import { Layout } from "./components/Layout";
import { useAppContext } from "./contexts/AppContext";
import { RADIUS_RATIO_SLUG } from "./features/radiusRatio/config";
import { useTheme } from "./hooks/useTheme";
import ErrorPage from "./pages/ErrorPage";
import HelpPage from "./pages/HelpPage";
import RadiusRatioPage from "./pages/RadiusRatioPage";

export function AppRoutes() {
  const { currentTheme } = useAppContext();
  useTheme(currentTheme);

  return (
    <Layout>
      <Routes>
        <Route path="/" element={<Navigate to={`/tools/${RADIUS_RATIO_SLUG}`} replace />} />
        <Route path={`/tools/${RADIUS_RATIO_SLUG}`} element={<RadiusRatioPage />} />
        <Route path="/help/:slug" element={<HelpPage />} />
        <Route path="*" element={<ErrorPage status={404} title="Page not found" message="The requested route does not exist." />} />
      </Routes>
    </Layout>
  );
}

export default function App() {
  return (
    <BrowserRouter>
      <AppRoutes />
    </BrowserRouter>
  );
}
