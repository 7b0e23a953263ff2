import { Component, type ErrorInfo, type ReactNode } from 'react';
import { AlertTriangle } from 'lucide-react';

interface Props {
    children: ReactNode;
}

interface State {
    error: Error | null;
}

/**
 * Last-resort fallback for render errors (an UnknownEventKindError from a tampered
 * preference, a chart crash). Data and HTTP problems are reported inline instead.
 */
export class ErrorBoundary extends Component<Props, State> {
    state: State = { error: null };

    static getDerivedStateFromError(error: Error): State {
        return { error };
    }

    componentDidCatch(error: Error, errorInfo: ErrorInfo) {
        console.error('[SpaceWeather] Uncaught render error', error, errorInfo);
    }

    private reset = () => this.setState({ error: null });

    render() {
        const { error } = this.state;
        if (!error) return this.props.children;

        return (
            <div role="alert" className="m-6 p-6 rounded-xl border border-red-200 bg-red-50 dark:bg-red-950/20 text-center space-y-4">
                <AlertTriangle className="h-10 w-10 text-red-500 mx-auto" />
                <h2 className="text-xl font-bold">Something Went Wrong</h2>
                <p className="text-sm text-muted-foreground">{error.message}</p>
                <button
                    onClick={this.reset}
                    className="px-4 py-2 bg-primary text-primary-foreground rounded-md hover:bg-primary/90 transition-colors"
                >
                    Try Again
                </button>
            </div>
        );
    }
}
