import './utils/setup-logging';
import './processes/tracker';
