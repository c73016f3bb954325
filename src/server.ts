import app from "./app";
import AppConfig from "./config/app.config";
import AppStarterService from "./services/App.starter.service";

const PORT = AppConfig.port;

app.listen(PORT, () => {
    console.log(`🚀 Server Running: http://localhost:${PORT}`);
    AppStarterService.onStartApp().catch(error => {
        console.error("Start-up failed:", error);
    });
});
