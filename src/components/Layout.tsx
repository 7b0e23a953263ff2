import { Outlet, Link } from 'react-router-dom';
import { Satellite, Moon, Sun, HelpCircle } from 'lucide-react';
import { useState } from 'react';
import { usePreferences } from '../hooks/usePreferences';
import { HelpModal } from './HelpModal';

export function Layout() {
    const { preferences, toggleDarkMode } = usePreferences();
    const [showHelp, setShowHelp] = useState(false);

    return (
        <div className="min-h-screen bg-background text-foreground flex flex-col font-sans transition-colors duration-200">
            <header className="border-b border-border bg-card p-4 sticky top-0 z-30 shadow-sm backdrop-blur-md bg-opacity-80">
                <div className="container mx-auto flex justify-between items-center">
                    <Link to="/" className="flex items-center gap-3 hover:opacity-80 transition-opacity">
                        <div className="bg-primary/10 p-2 rounded-lg">
                            <Satellite className="h-6 w-6 text-primary" />
                        </div>
                        <div>
                            <h1 className="text-xl font-bold bg-gradient-to-r from-primary to-blue-600 bg-clip-text text-transparent">
                                Space Weather Visualizer
                            </h1>
                            <p className="text-xs text-muted-foreground">
                                CMEs, geomagnetic storms, solar flares and more from NASA's DONKI API
                            </p>
                        </div>
                    </Link>

                    <div className="flex items-center gap-2">
                        <button
                            onClick={() => setShowHelp(true)}
                            className="text-sm font-medium hover:text-primary transition-colors hidden md:flex items-center gap-1 mr-4"
                        >
                            <HelpCircle className="h-4 w-4" /> Help
                        </button>
                        <button
                            onClick={toggleDarkMode}
                            className="p-2 hover:bg-muted rounded-full transition-colors"
                            title="Toggle Theme"
                        >
                            {preferences.darkMode ? <Sun className="h-5 w-5" /> : <Moon className="h-5 w-5" />}
                        </button>
                    </div>
                </div>
            </header>

            <main className="flex-1">
                <Outlet />
            </main>

            <footer className="border-t border-border p-6 bg-card mt-auto">
                <div className="container mx-auto flex flex-col md:flex-row justify-between items-center text-sm text-muted-foreground gap-4">
                    <p>Data: NASA DONKI. Open Source.</p>
                    <div className="flex gap-4">
                        <button onClick={() => setShowHelp(true)} className="hover:text-foreground transition-colors">Help & Glossary</button>
                    </div>
                </div>
            </footer>

            <HelpModal
                isOpen={showHelp}
                onClose={() => setShowHelp(false)}
            />
        </div>
    );
}
